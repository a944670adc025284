/**
 * Return Routes
 *
 * GET   /api/returns             - List newest first (status, orderId, sinceDays)
 * GET   /api/returns/summary     - Headline metrics for the same filter
 * GET   /api/returns/:id         - One return with its items
 * PATCH /api/returns/:id/status  - Change status; `processed` stamps processedAt
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import {
    idParamSchema,
    returnListQuerySchema,
    summarizeReturns,
    updateReturnStatusSchema,
} from '@supportdesk/shared';
import type { KyselyDB } from '../db/index.js';
import { getReturn, listReturns, updateReturnStatus } from '../db/queries/index.js';
import { asyncHandler, typedRoute } from '../middleware/asyncHandler.js';
import { NotFoundError } from '../utils/errors.js';
import { routeLogger as log } from '../utils/logger.js';

export function createReturnsRouter(db: KyselyDB): Router {
    const router: Router = Router();

    router.get('/', asyncHandler(async (req: Request, res: Response) => {
        const returns = await listReturns(db, returnListQuerySchema.parse(req.query));
        res.json({ returns, total: returns.length });
    }));

    router.get('/summary', asyncHandler(async (req: Request, res: Response) => {
        const returns = await listReturns(db, returnListQuerySchema.parse(req.query));
        res.json(summarizeReturns(returns));
    }));

    router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
        const { id } = idParamSchema.parse(req.params);
        const found = await getReturn(db, id);
        if (!found) {
            throw new NotFoundError(`Return #${id} not found`, 'ReturnOrder', id);
        }
        res.json(found);
    }));

    router.patch('/:id/status', typedRoute(updateReturnStatusSchema, async ({ status }, req, res) => {
        const { id } = idParamSchema.parse(req.params);
        const updated = await updateReturnStatus(db, id, status);
        if (!updated) {
            throw new NotFoundError(`Return #${id} not found`, 'ReturnOrder', id);
        }
        log.info({ returnId: id, status }, 'Return status updated');
        res.json(updated);
    }));

    return router;
}
