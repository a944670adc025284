/**
 * Health check
 *
 * GET /api/health - liveness plus a database round-trip
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { sql } from 'kysely';
import type { KyselyDB } from '../db/index.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { routeLogger as log } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export function createHealthRouter(db: KyselyDB): Router {
    const router: Router = Router();

    router.get('/', asyncHandler(async (_req: Request, res: Response) => {
        try {
            await sql`select 1`.execute(db);
            res.json({ status: 'ok', database: 'connected', timestamp: new Date().toISOString() });
        } catch (error: unknown) {
            log.error({ error: errorMessage(error) }, 'Health check database ping failed');
            res.status(503).json({ status: 'degraded', database: 'unreachable', timestamp: new Date().toISOString() });
        }
    }));

    return router;
}
