/**
 * Product Queries
 *
 * Catalogue reads for the chat tools and the product table view, plus the
 * category clean-up used by the normalize script.
 */

import type { Catalog, Product } from '@supportdesk/shared';
import type { KyselyDB } from '../index.js';
import { toNumber, toProduct } from './rowMappers.js';

// ============================================
// INPUT TYPES
// ============================================

export interface ProductListParams {
    /** Case-insensitive exact category */
    category?: string;
    /** Case-insensitive substring of name or description */
    search?: string;
}

export interface CategoryRename {
    from: string;
    to: string;
    updated: number;
}

export interface CategoryCount {
    category: string | null;
    count: number;
}

// ============================================
// READS
// ============================================

export async function getProducts(db: KyselyDB, params: ProductListParams = {}): Promise<Product[]> {
    const { category, search } = params;

    let query = db.selectFrom('Product').selectAll();

    if (category) {
        query = query.where(eb => eb(eb.fn<string>('lower', ['category']), '=', category.toLowerCase()));
    }
    if (search) {
        const term = `%${search.toLowerCase()}%`;
        query = query.where(eb => eb.or([
            eb(eb.fn<string>('lower', ['name']), 'like', term),
            eb(eb.fn<string>('lower', ['description']), 'like', term),
        ]));
    }

    const rows = await query.orderBy('name').orderBy('id').execute();
    return rows.map(toProduct);
}

export async function getProductById(db: KyselyDB, id: number): Promise<Product | undefined> {
    const row = await db.selectFrom('Product').selectAll().where('id', '=', id).executeTakeFirst();
    return row ? toProduct(row) : undefined;
}

export async function getProductsByIds(db: KyselyDB, ids: readonly number[]): Promise<Product[]> {
    if (ids.length === 0) return [];
    const rows = await db
        .selectFrom('Product')
        .selectAll()
        .where('id', 'in', [...new Set(ids)])
        .orderBy('id')
        .execute();
    return rows.map(toProduct);
}

/** Catalogue snapshot keyed by product id, for pricing */
export async function getCatalog(db: KyselyDB, ids: readonly number[]): Promise<Catalog> {
    const products = await getProductsByIds(db, ids);
    return new Map(products.map(p => [p.id, p]));
}

export async function getCategories(db: KyselyDB): Promise<string[]> {
    const rows = await db
        .selectFrom('Product')
        .select('category')
        .distinct()
        .where('category', 'is not', null)
        .orderBy('category')
        .execute();

    return rows.flatMap(r => (r.category === null ? [] : [r.category]));
}

// ============================================
// MAINTENANCE
// ============================================

/**
 * Rename categories in one transaction.
 *
 * @param mapping - Old category name to new one (exact match on the old name)
 * @returns Rows changed per rename and the resulting category counts
 */
export async function normalizeCategories(
    db: KyselyDB,
    mapping: Readonly<Record<string, string>>
): Promise<{ renamed: CategoryRename[]; distribution: CategoryCount[] }> {
    return db.transaction().execute(async (trx) => {
        const renamed: CategoryRename[] = [];

        for (const [from, to] of Object.entries(mapping)) {
            const result = await trx
                .updateTable('Product')
                .set({ category: to })
                .where('category', '=', from)
                .executeTakeFirst();
            renamed.push({ from, to, updated: toNumber(result.numUpdatedRows) });
        }

        const counts = await trx
            .selectFrom('Product')
            .select(eb => ['category', eb.fn.countAll().as('count')])
            .groupBy('category')
            .orderBy('category')
            .execute();

        return {
            renamed,
            distribution: counts.map(c => ({ category: c.category, count: toNumber(c.count) })),
        };
    });
}
