import type { KyselyDB } from '../index.js';
import { migrateToLatest } from '../migrations.js';
import { loadSeedData, seedDatabase } from '../seed.js';
import { getCategories } from '../queries/index.js';
import { createTestDb } from '../../__tests__/helpers/testDb.js';

describe('seed', () => {
    let db: KyselyDB;

    beforeEach(async () => {
        db = await createTestDb();
    });

    afterEach(async () => {
        await db.destroy();
    });

    it('loads the sample catalogue into empty tables only', async () => {
        const data = loadSeedData();

        expect(await seedDatabase(db, data)).toEqual({
            products: data.products.length,
            shippingRates: data.shippingRates.length,
        });
        expect(await seedDatabase(db, data)).toEqual({ products: 0, shippingRates: 0 });
    });

    it('uses lowercase singular categories', async () => {
        await seedDatabase(db);
        expect(await getCategories(db)).toEqual(['accessory', 'camera', 'headphone', 'keyboard', 'monitor', 'speaker']);
    });

    it('migrating an up-to-date schema is a no-op', async () => {
        await expect(migrateToLatest(db, 'sqlite')).resolves.toBeUndefined();
    });
});
