/**
 * Apply pending schema migrations to DATABASE_URL
 *
 * Run: npm run db:migrate -w server
 */

import { env } from '../config/env.js';
import { createKysely, destroyKysely } from '../db/index.js';
import { migrateToLatest } from '../db/migrations.js';

async function main(): Promise<void> {
    const db = createKysely(env.DATABASE_URL);
    try {
        await migrateToLatest(db, 'postgres');
        console.log('Database schema is up to date');
    } finally {
        await destroyKysely();
    }
}

main().catch((error: unknown) => {
    console.error('Migration failed:', error);
    process.exit(1);
});
