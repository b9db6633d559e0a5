/**
 * Dependency Container
 * Instantiates and wires repositories and services
 *
 * Controllers import their services from here; tests replace this module
 * with jest.mock to run the HTTP layer against an in-memory repository.
 */

import { AccountRepository } from '@/repositories/account.repository';
import { AccountService } from '@/services/account.service';
import { metrics } from '@/adapters/metrics/MetricsFactory';

// ============================================================================
// REPOSITORIES
// ============================================================================

export const accountRepository = new AccountRepository();

// ============================================================================
// SERVICES
// ============================================================================

export const accountService = new AccountService(accountRepository, metrics);
