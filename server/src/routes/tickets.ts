/**
 * Support Ticket Routes
 *
 * GET   /api/tickets             - List newest first (status, priority)
 * GET   /api/tickets/summary     - Headline metrics for the same filter
 * GET   /api/tickets/:id         - One ticket
 * PATCH /api/tickets/:id/status  - Change status; `resolved` stamps resolvedAt
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import {
    idParamSchema,
    summarizeTickets,
    ticketListQuerySchema,
    updateTicketStatusSchema,
} from '@supportdesk/shared';
import type { KyselyDB } from '../db/index.js';
import { getSupportTicket, listSupportTickets, updateTicketStatus } from '../db/queries/index.js';
import { asyncHandler, typedRoute } from '../middleware/asyncHandler.js';
import { NotFoundError } from '../utils/errors.js';
import { routeLogger as log } from '../utils/logger.js';

export function createTicketsRouter(db: KyselyDB): Router {
    const router: Router = Router();

    router.get('/', asyncHandler(async (req: Request, res: Response) => {
        const tickets = await listSupportTickets(db, ticketListQuerySchema.parse(req.query));
        res.json({ tickets, total: tickets.length });
    }));

    router.get('/summary', asyncHandler(async (req: Request, res: Response) => {
        const tickets = await listSupportTickets(db, ticketListQuerySchema.parse(req.query));
        res.json(summarizeTickets(tickets));
    }));

    router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
        const { id } = idParamSchema.parse(req.params);
        const ticket = await getSupportTicket(db, id);
        if (!ticket) {
            throw new NotFoundError(`Support ticket #${id} not found`, 'SupportTicket', id);
        }
        res.json(ticket);
    }));

    router.patch('/:id/status', typedRoute(updateTicketStatusSchema, async ({ status }, req, res) => {
        const { id } = idParamSchema.parse(req.params);
        const ticket = await updateTicketStatus(db, id, status);
        if (!ticket) {
            throw new NotFoundError(`Support ticket #${id} not found`, 'SupportTicket', id);
        }
        log.info({ ticketId: id, status }, 'Ticket status updated');
        res.json(ticket);
    }));

    return router;
}
