/**
 * Domain Layer
 *
 * Core business logic with no I/O. Shared between the server and the CLI.
 */

export * from './constants.js';
export * from './formatting.js';
export * from './orders/index.js';
export * from './returns/index.js';
export * from './shipping/index.js';
export * from './dashboard/index.js';
