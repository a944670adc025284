/**
 * One-time migration: rename plural, capitalised product categories to the
 * lowercase singular form the catalogue tool filters on.
 *
 * Run: npm run db:normalize-categories -w server
 * Dry run: npm run db:normalize-categories -w server -- --dry-run
 */

import { env } from '../config/env.js';
import { createKysely, destroyKysely } from '../db/index.js';
import { getCategories, normalizeCategories } from '../db/queries/index.js';

const DRY_RUN = process.argv.includes('--dry-run');

const LEGACY_CATEGORY_MAP: Readonly<Record<string, string>> = {
    Headphones: 'headphone',
    Cameras: 'camera',
    Monitors: 'monitor',
    Keyboards: 'keyboard',
    Speakers: 'speaker',
    Accessories: 'accessory',
};

async function main(): Promise<void> {
    const db = createKysely(env.DATABASE_URL);
    try {
        if (DRY_RUN) {
            const current = await getCategories(db);
            const pending = current.filter(c => c in LEGACY_CATEGORY_MAP);
            console.log(`[DRY RUN] Categories to rename: ${pending.length > 0 ? pending.join(', ') : 'none'}`);
            return;
        }

        const { renamed, distribution } = await normalizeCategories(db, LEGACY_CATEGORY_MAP);
        for (const r of renamed) {
            console.log(`Updated ${r.updated} products from '${r.from}' to '${r.to}'`);
        }

        console.log('\nCurrent category distribution:');
        for (const d of distribution) {
            console.log(`  ${d.category ?? '(none)'}: ${d.count} products`);
        }
    } finally {
        await destroyKysely();
    }
}

main().catch((error: unknown) => {
    console.error('Category update failed:', error);
    process.exit(1);
});
