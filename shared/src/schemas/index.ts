/**
 * Zod schemas for chat tool arguments and dashboard requests
 */

export * from './common.js';
export * from './tools.js';
export * from './dashboard.js';
