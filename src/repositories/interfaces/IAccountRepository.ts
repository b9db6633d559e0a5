import { Account, AccountInput } from '@/models';

/**
 * Account Repository Interface
 * Defines the contract for account data access operations
 */
export interface IAccountRepository {
  /**
   * Persist a new account; the store assigns its id
   */
  create(input: AccountInput): Promise<Account>;

  /**
   * @returns The account, or null if no account has this id
   */
  findById(id: number): Promise<Account | null>;

  /**
   * All accounts in insertion (id) order
   */
  findAll(): Promise<Account[]>;

  /**
   * Overwrite an account's writable attributes
   * @returns The updated account, or null if no account has this id
   */
  update(id: number, input: AccountInput): Promise<Account | null>;

  /**
   * Remove an account permanently
   * @returns Whether a row was deleted
   */
  delete(id: number): Promise<boolean>;
}
