/**
 * Kysely Factory
 *
 * Creates and manages a singleton Kysely instance over a pg pool.
 * Data-access functions take the handle as their first argument so the same
 * query runs on the pool, inside a transaction, or against the SQLite
 * database the tests build.
 *
 * Usage:
 *   import { createKysely } from './db/index.js';
 *   const db = createKysely();
 *   const products = await getProducts(db, { category: 'headphone' });
 */

import { Kysely, PostgresDialect, type LogEvent } from 'kysely';
import pg from 'pg';
import type { DB } from './types.js';
import { dbLogger } from '../utils/logger.js';

/** Dialects the schema migrations know how to build */
export type SqlDialectName = 'postgres' | 'sqlite';

/**
 * Type helper for Kysely instance
 * Use this when typing function parameters that accept a Kysely instance
 */
export type KyselyDB = Kysely<DB>;

let kyselyInstance: Kysely<DB> | null = null;

/** Kysely `log` hook: statements at debug, failures at error */
export function logQuery(event: LogEvent): void {
    const context = {
        sql: event.query.sql,
        params: event.query.parameters,
        durationMs: Math.round(event.queryDurationMillis),
    };

    if (event.level === 'error') {
        dbLogger.error({ ...context, err: event.error }, 'Query failed');
        return;
    }
    dbLogger.debug(context, 'Query executed');
}

/**
 * Create or return the singleton Kysely instance
 *
 * @param connectionString - PostgreSQL connection string (defaults to DATABASE_URL)
 */
export function createKysely(connectionString?: string): Kysely<DB> {
    if (kyselyInstance) return kyselyInstance;

    const pool = new pg.Pool({
        connectionString: connectionString || process.env.DATABASE_URL,
        max: 10,
    });

    kyselyInstance = new Kysely<DB>({
        dialect: new PostgresDialect({ pool }),
        log: logQuery,
    });

    return kyselyInstance;
}

/** Close the pool (scripts and graceful shutdown) */
export async function destroyKysely(): Promise<void> {
    if (!kyselyInstance) return;
    const instance = kyselyInstance;
    kyselyInstance = null;
    await instance.destroy();
}

export type { DB } from './types.js';
