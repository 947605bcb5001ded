/**
 * Environment for every Jest worker, applied before any module loads.
 * Configuration is validated when the config module is imported.
 */
process.env.NODE_ENV = 'test';
process.env.SECRET_KEY = 'test-secret';
process.env.EMAIL_TRANSPORT = 'json';
process.env.SCHEDULER_ENABLED = 'false';
process.env.PASSWORD_HASH_ITERATIONS = '1000';
