/**
 * Shipping Routes
 *
 * GET /api/shipping/rates     - Rate table (carrier, serviceType)
 * GET /api/shipping/estimate  - Cost per matching rate for a ZIP and weight
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import {
    estimateShipping,
    shippingEstimateQuerySchema,
    shippingRateQuerySchema,
    summarizeShippingRates,
} from '@supportdesk/shared';
import type { KyselyDB } from '../db/index.js';
import { findShippingRates, listShippingRates } from '../db/queries/index.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { NotFoundError } from '../utils/errors.js';

export function createShippingRouter(db: KyselyDB): Router {
    const router: Router = Router();

    router.get('/rates', asyncHandler(async (req: Request, res: Response) => {
        const rates = await listShippingRates(db, shippingRateQuerySchema.parse(req.query));
        res.json({ rates, summary: summarizeShippingRates(rates) });
    }));

    router.get('/estimate', asyncHandler(async (req: Request, res: Response) => {
        const { zip, weight, serviceLevel } = shippingEstimateQuerySchema.parse(req.query);
        const rates = await findShippingRates(db, zip, serviceLevel);
        if (rates.length === 0) {
            throw new NotFoundError(`No shipping rates available for ${zip}`, 'ShippingRate', zip);
        }
        res.json({ zip, weightLbs: weight, options: estimateShipping(rates, weight) });
    }));

    return router;
}
