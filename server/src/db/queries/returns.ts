/**
 * Return Queries
 *
 * A return covers the whole order or chosen items. Quantities already on
 * earlier returns (other than rejected ones) are not returnable again.
 * Stock is not restored by a return.
 */

import {
    INITIAL_RETURN_STATUS,
    RETURN_PROCESSED_STATUS,
    resolveReturnLines,
    type ReturnItem,
    type ReturnLineRequest,
    type ReturnOrder,
    type ReturnOrderWithItems,
    type ReturnStatus,
    type ReturnableLine,
    type OrderItem,
} from '@supportdesk/shared';
import type { KyselyDB } from '../index.js';
import { BusinessLogicError, NotFoundError } from '../../utils/errors.js';
import { getOrderItems } from './orders.js';
import { nowIso, toNumber, toReturnOrder } from './rowMappers.js';

// ============================================
// INPUT TYPES
// ============================================

export interface CreateReturnInput {
    orderId: number;
    reason: string;
    /** Specific items; omit to return everything still returnable */
    lines?: ReturnLineRequest[];
}

export interface ReturnListParams {
    status?: ReturnStatus;
    orderId?: number;
    /** Only returns created within the last N days */
    sinceDays?: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================
// HELPERS
// ============================================

/** Quantity per product already on non-rejected returns of the order */
export async function getReturnedQuantities(db: KyselyDB, orderId: number): Promise<Map<number, number>> {
    const rows = await db
        .selectFrom('ReturnItem')
        .innerJoin('ReturnOrder', 'ReturnOrder.id', 'ReturnItem.returnId')
        .select(['ReturnItem.productId', 'ReturnItem.quantity'])
        .where('ReturnOrder.orderId', '=', orderId)
        .where('ReturnOrder.status', '!=', 'rejected')
        .execute();

    const returned = new Map<number, number>();
    for (const row of rows) {
        returned.set(row.productId, (returned.get(row.productId) ?? 0) + row.quantity);
    }
    return returned;
}

function toReturnableLines(items: readonly OrderItem[], returned: ReadonlyMap<number, number>): ReturnableLine[] {
    const byProduct = new Map<number, ReturnableLine>();
    for (const item of items) {
        const existing = byProduct.get(item.productId);
        if (existing) {
            existing.orderedQuantity += item.quantity;
            continue;
        }
        byProduct.set(item.productId, {
            productId: item.productId,
            productName: item.productName,
            orderedQuantity: item.quantity,
            returnedQuantity: returned.get(item.productId) ?? 0,
            priceAtPurchase: item.priceAtPurchase,
        });
    }
    return [...byProduct.values()];
}

// ============================================
// WRITES
// ============================================

/**
 * Create one return and its items in a single transaction.
 *
 * @throws NotFoundError when the order does not exist
 * @throws BusinessLogicError when the requested lines cannot be returned
 */
export async function createReturn(db: KyselyDB, input: CreateReturnInput): Promise<ReturnOrderWithItems> {
    return db.transaction().execute(async (trx) => {
        const order = await trx
            .selectFrom('Order')
            .select('id')
            .where('id', '=', input.orderId)
            .executeTakeFirst();
        if (!order) {
            throw new NotFoundError(`Order #${input.orderId} not found`, 'Order', input.orderId);
        }

        const items = await getOrderItems(trx, input.orderId);
        const returned = await getReturnedQuantities(trx, input.orderId);
        const resolution = resolveReturnLines(input.orderId, toReturnableLines(items, returned), input.lines);
        if (!resolution.ok) {
            throw new BusinessLogicError(resolution.error, 'return_lines');
        }

        const now = nowIso();
        const created = await trx
            .insertInto('ReturnOrder')
            .values({
                orderId: input.orderId,
                reason: input.reason,
                status: INITIAL_RETURN_STATUS,
                refundTotalAmount: resolution.refundTotal,
                createdAt: now,
                updatedAt: now,
            })
            .returning('id')
            .executeTakeFirstOrThrow();

        await trx
            .insertInto('ReturnItem')
            .values(resolution.lines.map(line => ({
                returnId: created.id,
                productId: line.productId,
                quantity: line.quantity,
                priceAtPurchase: line.priceAtPurchase,
                refundAmount: line.refundAmount,
            })))
            .execute();

        const result = await getReturn(trx, created.id);
        if (!result) {
            throw new BusinessLogicError(`Return #${created.id} could not be read back`);
        }
        return result;
    });
}

/** Moving to `processed` stamps processedAt */
export async function updateReturnStatus(
    db: KyselyDB,
    id: number,
    status: ReturnStatus
): Promise<ReturnOrder | undefined> {
    const now = nowIso();
    const row = await db
        .updateTable('ReturnOrder')
        .set({
            status,
            updatedAt: now,
            ...(status === RETURN_PROCESSED_STATUS && { processedAt: now }),
        })
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst();
    return row ? toReturnOrder(row) : undefined;
}

// ============================================
// READS
// ============================================

async function getReturnItems(db: KyselyDB, returnId: number): Promise<ReturnItem[]> {
    const rows = await db
        .selectFrom('ReturnItem')
        .innerJoin('Product', 'Product.id', 'ReturnItem.productId')
        .select([
            'ReturnItem.id',
            'ReturnItem.returnId',
            'ReturnItem.productId',
            'ReturnItem.quantity',
            'ReturnItem.priceAtPurchase',
            'ReturnItem.refundAmount',
            'Product.name as productName',
        ])
        .where('ReturnItem.returnId', '=', returnId)
        .orderBy('ReturnItem.id')
        .execute();

    return rows.map(r => ({
        id: r.id,
        returnId: r.returnId,
        productId: r.productId,
        productName: r.productName,
        quantity: r.quantity,
        priceAtPurchase: toNumber(r.priceAtPurchase),
        refundAmount: toNumber(r.refundAmount),
    }));
}

export async function getReturn(db: KyselyDB, id: number): Promise<ReturnOrderWithItems | undefined> {
    const row = await db.selectFrom('ReturnOrder').selectAll().where('id', '=', id).executeTakeFirst();
    if (!row) return undefined;

    const items = await getReturnItems(db, id);
    return { ...toReturnOrder(row), items };
}

/** Newest first */
export async function listReturns(
    db: KyselyDB,
    params: ReturnListParams = {},
    now: Date = new Date()
): Promise<ReturnOrder[]> {
    let query = db.selectFrom('ReturnOrder').selectAll();
    if (params.status) query = query.where('status', '=', params.status);
    if (params.orderId) query = query.where('orderId', '=', params.orderId);
    if (params.sinceDays) {
        const cutoff = new Date(now.getTime() - params.sinceDays * DAY_MS).toISOString();
        query = query.where('createdAt', '>=', cutoff);
    }

    const rows = await query.orderBy('createdAt', 'desc').orderBy('id', 'desc').execute();
    return rows.map(toReturnOrder);
}
