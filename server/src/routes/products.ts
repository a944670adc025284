/**
 * Product Catalog Routes
 *
 * GET /api/products              - List (category, search)
 * GET /api/products/categories   - Distinct categories
 * GET /api/products/:id          - One product
 *
 * Route order matters: /categories must be before /:id
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { idParamSchema, productListQuerySchema } from '@supportdesk/shared';
import type { KyselyDB } from '../db/index.js';
import { getCategories, getProductById, getProducts } from '../db/queries/index.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { NotFoundError } from '../utils/errors.js';

export function createProductsRouter(db: KyselyDB): Router {
    const router: Router = Router();

    router.get('/', asyncHandler(async (req: Request, res: Response) => {
        const query = productListQuerySchema.parse(req.query);
        const products = await getProducts(db, query);
        res.json({ products, total: products.length });
    }));

    router.get('/categories', asyncHandler(async (_req: Request, res: Response) => {
        res.json({ categories: await getCategories(db) });
    }));

    router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
        const { id } = idParamSchema.parse(req.params);
        const product = await getProductById(db, id);
        if (!product) {
            throw new NotFoundError(`Product #${id} not found`, 'Product', id);
        }
        res.json(product);
    }));

    return router;
}
