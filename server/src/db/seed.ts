/**
 * Sample catalogue and shipping rates
 *
 * Loads data/seed.json into an empty database. Products and rates are only
 * inserted into empty tables, so running the seed twice is harmless.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { shippingServiceLevelSchema } from '@supportdesk/shared';
import type { KyselyDB } from './index.js';
import { nowIso, toNumber } from './queries/rowMappers.js';
import { dbLogger as log } from '../utils/logger.js';

const DEFAULT_SEED_FILE = fileURLToPath(new URL('../../data/seed.json', import.meta.url));

const seedDataSchema = z.object({
    products: z.array(z.object({
        name: z.string().min(1),
        specifications: z.string().nullable().default(null),
        description: z.string().nullable().default(null),
        price: z.number().nonnegative(),
        category: z.string().nullable().default(null),
        stockQuantity: z.number().int().nonnegative(),
    })),
    shippingRates: z.array(z.object({
        carrier: z.string().min(1),
        serviceType: shippingServiceLevelSchema,
        zipCode: z.string().min(1),
        baseRate: z.number().nonnegative(),
        perLbRate: z.number().nonnegative(),
        estimatedDays: z.number().int().positive().nullable().default(null),
    })),
});

export type SeedData = z.infer<typeof seedDataSchema>;

export interface SeedResult {
    products: number;
    shippingRates: number;
}

export function loadSeedData(file: string = DEFAULT_SEED_FILE): SeedData {
    return seedDataSchema.parse(JSON.parse(readFileSync(file, 'utf8')));
}

async function countRows(db: KyselyDB, table: 'Product' | 'ShippingRate'): Promise<number> {
    const row = await db
        .selectFrom(table)
        .select(eb => eb.fn.countAll().as('count'))
        .executeTakeFirstOrThrow();
    return toNumber(row.count);
}

/** Insert the sample rows into whichever tables are empty */
export async function seedDatabase(db: KyselyDB, data: SeedData = loadSeedData()): Promise<SeedResult> {
    return db.transaction().execute(async (trx) => {
        const result: SeedResult = { products: 0, shippingRates: 0 };

        if ((await countRows(trx, 'Product')) === 0 && data.products.length > 0) {
            const createdAt = nowIso();
            await trx
                .insertInto('Product')
                .values(data.products.map(p => ({ ...p, createdAt })))
                .execute();
            result.products = data.products.length;
        } else {
            log.info('Product table already populated, skipping');
        }

        if ((await countRows(trx, 'ShippingRate')) === 0 && data.shippingRates.length > 0) {
            await trx.insertInto('ShippingRate').values(data.shippingRates).execute();
            result.shippingRates = data.shippingRates.length;
        } else {
            log.info('ShippingRate table already populated, skipping');
        }

        return result;
    });
}
