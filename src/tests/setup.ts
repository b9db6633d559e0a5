/**
 * Jest setup
 * Runs before each test file's modules load, so env.ts sees these values
 */

// Keep test output readable; set LOG_LEVEL to debug a failing test
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
process.env.LOGGER_TYPE = 'console';
process.env.METRICS_TYPE = 'noop';
