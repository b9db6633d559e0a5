/**
 * Account model
 * Matches the 'accounts' table schema (see db/schema.sql)
 */
export interface Account {
  id: number;
  name: string;
  email: string;
  address: string | null;
  phoneNumber: string | null;
  /** ISO date, YYYY-MM-DD */
  dateJoined: string;
}

/**
 * Writable attributes of an account - an Account that has no identity yet.
 * A missing dateJoined means "today" on create and "unchanged" on update.
 */
export interface AccountInput {
  name: string;
  email: string;
  address: string | null;
  phoneNumber: string | null;
  dateJoined?: string;
}

/**
 * Wire representation returned by the API
 */
export interface SerializedAccount {
  id: number;
  name: string;
  email: string;
  address: string | null;
  phone_number: string | null;
  date_joined: string;
}
