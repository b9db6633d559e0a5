import { AccountService } from '@/services/account.service';
import { NoOpMetrics } from '@/adapters/metrics/NoOpMetrics';
import { InMemoryAccountRepository } from './InMemoryAccountRepository';

/**
 * Replacement for '@/config/dependencies' in API tests:
 *
 * jest.mock('@/config/dependencies', () =>
 *   jest.requireActual('@/tests/utils/inMemoryDependencies').createInMemoryDependencies()
 * );
 */
export function createInMemoryDependencies() {
  const accountRepository = new InMemoryAccountRepository();
  const accountService = new AccountService(accountRepository, new NoOpMetrics());

  return { accountRepository, accountService };
}
