/**
 * Migrate, then load the sample catalogue and shipping rates
 *
 * Run: npm run db:seed -w server
 */

import { env } from '../config/env.js';
import { createKysely, destroyKysely } from '../db/index.js';
import { migrateToLatest } from '../db/migrations.js';
import { seedDatabase } from '../db/seed.js';

async function main(): Promise<void> {
    const db = createKysely(env.DATABASE_URL);
    try {
        await migrateToLatest(db, 'postgres');
        const result = await seedDatabase(db);
        console.log(`Inserted ${result.products} products and ${result.shippingRates} shipping rates`);
    } finally {
        await destroyKysely();
    }
}

main().catch((error: unknown) => {
    console.error('Seed failed:', error);
    process.exit(1);
});
