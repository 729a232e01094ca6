/**
 * Jest test setup file
 * Runs before each test file
 */

// Set test environment variables
process.env.NODE_ENV = 'test';

// Module-level loggers read this when they are created
process.env.CLEANER_LOG_LEVEL = 'silent';

// Options come from the test, never from the developer's shell
delete process.env.CLEANER_POLICY;
delete process.env.CLEANER_TRIM;
delete process.env.CLEANER_DROP_MISSING_EMAIL;
delete process.env.CLEANER_FILTER_VALID_EMAILS;
delete process.env.CLEANER_DEDUPE_BY_EMAIL;
