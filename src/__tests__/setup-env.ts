/**
 * Test environment: in-memory storage, fixed secret and zone.
 * Loaded by Jest before any test module imports the config.
 */

process.env.NODE_ENV = 'test';
process.env.DB_DRIVER = 'memory';
process.env.JWT_SECRET = 'test-secret';
process.env.TIME_ZONE = 'Asia/Manila';
process.env.CURRENCY_SYMBOL = '₱';
process.env.ENABLE_REQUEST_LOGGING = 'false';
process.env.BCRYPT_ROUNDS = '4';
