import { Account, AccountInput } from '@/models';
import { IAccountRepository } from '@/repositories/interfaces';
import { IMetrics } from '@/interfaces/IMetrics';
import { NotFoundError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * Account Service
 * Business logic for the account lifecycle
 *
 * Every by-id operation reports a missing account the same way, with a
 * NotFoundError naming the id.
 */
export class AccountService {
  constructor(
    private accountRepo: IAccountRepository,
    private metrics: IMetrics
  ) {}

  async createAccount(input: AccountInput): Promise<Account> {
    logger.info('Request to create an Account');

    const account = await this.accountRepo.create(input);

    this.metrics.incrementCounter('accounts.created');
    logger.info({ accountId: account.id }, 'Account created');

    return account;
  }

  async listAccounts(): Promise<Account[]> {
    logger.info('Request to list all Accounts');

    const endTimer = this.metrics.startTimer('accounts.list.duration');
    const accounts = await this.accountRepo.findAll();
    endTimer();

    logger.debug({ count: accounts.length }, 'Accounts listed');
    return accounts;
  }

  async getAccount(id: number): Promise<Account> {
    logger.info({ accountId: id }, 'Request to read an Account');

    const account = await this.accountRepo.findById(id);
    if (!account) {
      throw accountNotFound(id);
    }

    return account;
  }

  async updateAccount(id: number, input: AccountInput): Promise<Account> {
    logger.info({ accountId: id }, 'Request to update an Account');

    const account = await this.accountRepo.update(id, input);
    if (!account) {
      throw accountNotFound(id);
    }

    this.metrics.incrementCounter('accounts.updated');
    return account;
  }

  async deleteAccount(id: number): Promise<void> {
    logger.info({ accountId: id }, 'Request to delete an Account');

    const deleted = await this.accountRepo.delete(id);
    if (!deleted) {
      throw accountNotFound(id);
    }

    this.metrics.incrementCounter('accounts.deleted');
  }
}

function accountNotFound(id: number): NotFoundError {
  return new NotFoundError(`Account with id [${id}] could not be found.`);
}
