/**
 * Knowledge Base Routes
 *
 * GET /api/knowledge-base/status    - Vector store connection and collection size
 * GET /api/knowledge-base/articles  - Help-centre articles available to the agent
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { KnowledgeBase } from '../services/knowledgeBase/index.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

export function createKnowledgeBaseRouter(knowledgeBase: KnowledgeBase): Router {
    const router: Router = Router();

    router.get('/status', asyncHandler(async (_req: Request, res: Response) => {
        res.json(await knowledgeBase.getCollectionInfo());
    }));

    router.get('/articles', (_req: Request, res: Response) => {
        res.json({ articles: knowledgeBase.listArticles() });
    });

    return router;
}
