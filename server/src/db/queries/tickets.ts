/**
 * Support Ticket Queries
 */

import {
    INITIAL_TICKET_STATUS,
    TICKET_RESOLVED_STATUS,
    type SupportTicket,
    type TicketPriority,
    type TicketStatus,
} from '@supportdesk/shared';
import type { KyselyDB } from '../index.js';
import { NotFoundError } from '../../utils/errors.js';
import { getProductById } from './products.js';
import { nowIso, toSupportTicket } from './rowMappers.js';

export interface CreateSupportTicketInput {
    customerName: string;
    customerEmail?: string | null;
    productId?: number | null;
    issueDescription: string;
    priority: TicketPriority;
}

export interface TicketListParams {
    status?: TicketStatus;
    priority?: TicketPriority;
}

/**
 * Open a ticket.
 * @throws NotFoundError when a product id is given that does not exist
 */
export async function createSupportTicket(db: KyselyDB, input: CreateSupportTicketInput): Promise<SupportTicket> {
    const productId = input.productId ?? null;
    if (productId !== null && !(await getProductById(db, productId))) {
        throw new NotFoundError(`Product #${productId} not found`, 'Product', productId);
    }

    const now = nowIso();
    const row = await db
        .insertInto('SupportTicket')
        .values({
            customerName: input.customerName,
            customerEmail: input.customerEmail ?? null,
            productId,
            issueDescription: input.issueDescription,
            priority: input.priority,
            status: INITIAL_TICKET_STATUS,
            createdAt: now,
            updatedAt: now,
        })
        .returningAll()
        .executeTakeFirstOrThrow();

    return toSupportTicket(row);
}

export async function getSupportTicket(db: KyselyDB, id: number): Promise<SupportTicket | undefined> {
    const row = await db.selectFrom('SupportTicket').selectAll().where('id', '=', id).executeTakeFirst();
    return row ? toSupportTicket(row) : undefined;
}

/** Newest first */
export async function listSupportTickets(db: KyselyDB, params: TicketListParams = {}): Promise<SupportTicket[]> {
    let query = db.selectFrom('SupportTicket').selectAll();
    if (params.status) query = query.where('status', '=', params.status);
    if (params.priority) query = query.where('priority', '=', params.priority);

    const rows = await query.orderBy('createdAt', 'desc').orderBy('id', 'desc').execute();
    return rows.map(toSupportTicket);
}

/** Moving to `resolved` stamps resolvedAt */
export async function updateTicketStatus(
    db: KyselyDB,
    id: number,
    status: TicketStatus
): Promise<SupportTicket | undefined> {
    const now = nowIso();
    const row = await db
        .updateTable('SupportTicket')
        .set({
            status,
            updatedAt: now,
            ...(status === TICKET_RESOLVED_STATUS && { resolvedAt: now }),
        })
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst();
    return row ? toSupportTicket(row) : undefined;
}
