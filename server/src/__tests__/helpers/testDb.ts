/**
 * In-memory SQLite database for query, tool and route tests.
 * Runs the same migrations as production through Kysely's SqliteDialect.
 */

import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import type { ShippingServiceLevel } from '@supportdesk/shared';
import type { DB, KyselyDB } from '../../db/index.js';
import { migrateToLatest } from '../../db/migrations.js';
import { nowIso } from '../../db/queries/rowMappers.js';
import { KnowledgeBase, type KnowledgeBaseData } from '../../services/knowledgeBase/index.js';

export async function createTestDb(): Promise<KyselyDB> {
    const db = new Kysely<DB>({
        dialect: new SqliteDialect({ database: new Database(':memory:') }),
    });
    await migrateToLatest(db, 'sqlite');
    return db;
}

export interface ProductFixture {
    name: string;
    price: number;
    stockQuantity: number;
    category?: string | null;
    description?: string | null;
    specifications?: string | null;
}

export interface ShippingRateFixture {
    carrier: string;
    serviceType: ShippingServiceLevel;
    zipCode: string;
    baseRate: number;
    perLbRate: number;
    estimatedDays: number | null;
}

/** Ids 1, 2 and 3 in a fresh database */
export const PRODUCTS: ProductFixture[] = [
    { name: 'Trail Backpack', price: 89.5, stockQuantity: 10, category: 'bag', description: 'Waterproof 30L daypack' },
    { name: 'Insulated Bottle', price: 24.99, stockQuantity: 3, category: 'accessory', description: 'Keeps drinks cold for 24 hours' },
    { name: 'Camp Stove', price: 59, stockQuantity: 0, category: 'Accessory', description: null },
];

/** Ids 1, 2 and 3 in a fresh database */
export const SHIPPING_RATES: ShippingRateFixture[] = [
    { carrier: 'UPS', serviceType: 'standard', zipCode: '*', baseRate: 7.49, perLbRate: 0.4, estimatedDays: 5 },
    { carrier: 'FedEx', serviceType: 'express', zipCode: '*', baseRate: 15.49, perLbRate: 0.85, estimatedDays: 2 },
    { carrier: 'USPS', serviceType: 'standard', zipCode: '10001', baseRate: 4.99, perLbRate: 0.4, estimatedDays: 4 },
];

export async function insertProducts(db: KyselyDB, products: readonly ProductFixture[] = PRODUCTS): Promise<number[]> {
    const createdAt = nowIso();
    const rows = await db
        .insertInto('Product')
        .values(products.map(p => ({
            name: p.name,
            price: p.price,
            stockQuantity: p.stockQuantity,
            category: p.category ?? null,
            description: p.description ?? null,
            specifications: p.specifications ?? null,
            createdAt,
        })))
        .returning('id')
        .execute();
    return rows.map(r => r.id);
}

export async function insertShippingRates(
    db: KyselyDB,
    rates: readonly ShippingRateFixture[] = SHIPPING_RATES
): Promise<void> {
    await db.insertInto('ShippingRate').values([...rates]).execute();
}

/** Catalogue, rates, nothing else */
export async function createSeededTestDb(): Promise<KyselyDB> {
    const db = await createTestDb();
    await insertProducts(db);
    await insertShippingRates(db);
    return db;
}

export const KNOWLEDGE_BASE_DATA: KnowledgeBaseData = {
    articles: [
        {
            id: 1,
            score: 0.9,
            title: 'Return Policy',
            content: 'Returns are accepted within 30 days of delivery.',
            category: 'returns',
            url: '/help/returns',
        },
        {
            id: 2,
            score: 0.8,
            title: 'Shipping Options',
            content: 'Standard and express delivery to every state.',
            category: 'shipping',
            url: '/help/shipping',
        },
    ],
    procedures: [
        { tool: 'order_status', title: 'Looking up an order', content: 'Ask for the order number first.' },
        { tool: 'initiate_return', title: 'Starting a return', content: 'Confirm the items and the reason.' },
        { tool: 'estimate_shipping', title: 'Quoting shipping', content: 'Ask for the destination ZIP code.' },
    ],
};

export function createTestKnowledgeBase(): KnowledgeBase {
    return new KnowledgeBase({ collection: 'support_articles', data: KNOWLEDGE_BASE_DATA });
}
