/**
 * Data-access layer
 *
 * Every function takes the Kysely handle first so callers can pass the pool,
 * a transaction or a test database.
 */

export * from './products.js';
export * from './orders.js';
export * from './tickets.js';
export * from './returns.js';
export * from './shipping.js';
