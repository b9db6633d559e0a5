import { Account, AccountInput } from '@/models';
import { IAccountRepository } from '@/repositories/interfaces';

function today(): string {
  return new Date().toISOString().slice(0, 10);
}

/**
 * In-process stand-in for AccountRepository
 * Mirrors the SQL behaviour: ids start at 1 and are never reused, rows come
 * back in id order, and update keeps date_joined unless one is supplied.
 */
export class InMemoryAccountRepository implements IAccountRepository {
  private readonly accounts = new Map<number, Account>();
  private nextId = 1;

  async create(input: AccountInput): Promise<Account> {
    const account: Account = {
      id: this.nextId++,
      name: input.name,
      email: input.email,
      address: input.address,
      phoneNumber: input.phoneNumber,
      dateJoined: input.dateJoined ?? today(),
    };
    this.accounts.set(account.id, account);
    return { ...account };
  }

  async findById(id: number): Promise<Account | null> {
    const account = this.accounts.get(id);
    return account ? { ...account } : null;
  }

  async findAll(): Promise<Account[]> {
    return [...this.accounts.values()]
      .sort((a, b) => a.id - b.id)
      .map((account) => ({ ...account }));
  }

  async update(id: number, input: AccountInput): Promise<Account | null> {
    const existing = this.accounts.get(id);
    if (!existing) return null;

    const updated: Account = {
      id,
      name: input.name,
      email: input.email,
      address: input.address,
      phoneNumber: input.phoneNumber,
      dateJoined: input.dateJoined ?? existing.dateJoined,
    };
    this.accounts.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<boolean> {
    return this.accounts.delete(id);
  }
}
