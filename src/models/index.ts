/**
 * Central export point for all models
 */
export * from './Account';
