/**
 * Order Routes
 *
 * GET   /api/orders             - List newest first (status)
 * GET   /api/orders/summary     - Headline metrics for the same filter
 * GET   /api/orders/:id         - One order with its items
 * PATCH /api/orders/:id/status  - Change status
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import {
    idParamSchema,
    orderListQuerySchema,
    summarizeOrders,
    updateOrderStatusSchema,
} from '@supportdesk/shared';
import type { KyselyDB } from '../db/index.js';
import { getOrder, listOrders, updateOrderStatus } from '../db/queries/index.js';
import { asyncHandler, typedRoute } from '../middleware/asyncHandler.js';
import { NotFoundError } from '../utils/errors.js';
import { routeLogger as log } from '../utils/logger.js';

export function createOrdersRouter(db: KyselyDB): Router {
    const router: Router = Router();

    router.get('/', asyncHandler(async (req: Request, res: Response) => {
        const orders = await listOrders(db, orderListQuerySchema.parse(req.query));
        res.json({ orders, total: orders.length });
    }));

    router.get('/summary', asyncHandler(async (req: Request, res: Response) => {
        const orders = await listOrders(db, orderListQuerySchema.parse(req.query));
        res.json(summarizeOrders(orders));
    }));

    router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
        const { id } = idParamSchema.parse(req.params);
        const order = await getOrder(db, id);
        if (!order) {
            throw new NotFoundError(`Order #${id} not found`, 'Order', id);
        }
        res.json(order);
    }));

    router.patch('/:id/status', typedRoute(updateOrderStatusSchema, async ({ status }, req, res) => {
        const { id } = idParamSchema.parse(req.params);
        const order = await updateOrderStatus(db, id, status);
        if (!order) {
            throw new NotFoundError(`Order #${id} not found`, 'Order', id);
        }
        log.info({ orderId: id, status }, 'Order status updated');
        res.json(order);
    }));

    return router;
}
