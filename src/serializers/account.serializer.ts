import { Account, SerializedAccount } from '@/models';

/**
 * Convert an Account into its JSON wire shape
 */
export function serializeAccount(account: Account): SerializedAccount {
  return {
    id: account.id,
    name: account.name,
    email: account.email,
    address: account.address,
    phone_number: account.phoneNumber,
    date_joined: account.dateJoined,
  };
}
