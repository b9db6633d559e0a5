import { query } from '@/config/database';
import { Account, AccountInput } from '@/models';
import { IAccountRepository } from './interfaces/IAccountRepository';

/**
 * Largest value a PostgreSQL SERIAL (int4) column can hold
 */
export const MAX_ACCOUNT_ID = 2_147_483_647;

const ACCOUNT_COLUMNS = `
  id,
  name,
  email,
  address,
  phone_number AS "phoneNumber",
  date_joined AS "dateJoined"
`;

/**
 * Ids outside the int4 range can't exist; skip the round trip (and the
 * "out of range for type integer" error) for them
 */
function isStorableId(id: number): boolean {
  return Number.isInteger(id) && id >= 0 && id <= MAX_ACCOUNT_ID;
}

/**
 * Account Repository
 * Handles all database operations for accounts
 */
export class AccountRepository implements IAccountRepository {
  async create(input: AccountInput): Promise<Account> {
    const result = await query<Account>(
      `
      INSERT INTO accounts (name, email, address, phone_number, date_joined)
      VALUES ($1, $2, $3, $4, COALESCE($5::date, CURRENT_DATE))
      RETURNING ${ACCOUNT_COLUMNS}
      `,
      [input.name, input.email, input.address, input.phoneNumber, input.dateJoined ?? null]
    );

    const account = result.rows[0];
    if (!account) {
      throw new Error('INSERT into accounts returned no row');
    }
    return account;
  }

  async findById(id: number): Promise<Account | null> {
    if (!isStorableId(id)) return null;

    const result = await query<Account>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE id = $1`,
      [id]
    );

    return result.rows[0] ?? null;
  }

  async findAll(): Promise<Account[]> {
    const result = await query<Account>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts ORDER BY id ASC`
    );

    return result.rows;
  }

  /**
   * date_joined is only overwritten when the input carries one
   */
  async update(id: number, input: AccountInput): Promise<Account | null> {
    if (!isStorableId(id)) return null;

    const result = await query<Account>(
      `
      UPDATE accounts
      SET
        name = $2,
        email = $3,
        address = $4,
        phone_number = $5,
        date_joined = COALESCE($6::date, date_joined)
      WHERE id = $1
      RETURNING ${ACCOUNT_COLUMNS}
      `,
      [id, input.name, input.email, input.address, input.phoneNumber, input.dateJoined ?? null]
    );

    return result.rows[0] ?? null;
  }

  async delete(id: number): Promise<boolean> {
    if (!isStorableId(id)) return false;

    const result = await query('DELETE FROM accounts WHERE id = $1', [id]);

    return (result.rowCount ?? 0) > 0;
  }
}
