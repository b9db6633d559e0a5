/**
 * Repository Interfaces
 * Central export point for all repository interfaces
 */
export * from './IAccountRepository';
