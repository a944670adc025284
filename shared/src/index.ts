/**
 * @supportdesk/shared - Shared types, schemas and domain logic
 *
 * Entity types come from ./types, zod schemas from ./schemas and pure
 * business rules from ./domain. Nothing here touches the database or network.
 */

export type * from './types/index.js';
export * from './schemas/index.js';
export * from './domain/index.js';
