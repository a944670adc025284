/**
 * Express application
 *
 * Built from its dependencies so tests can mount it over an in-memory
 * database and a scripted model client.
 */

import express, { type Express } from 'express';
import cors from 'cors';
import type { KyselyDB } from './db/index.js';
import type { KnowledgeBase } from './services/knowledgeBase/index.js';
import type { ChatAgent } from './services/chatAgent/index.js';
import { requestLogger } from './utils/logger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createHealthRouter } from './routes/health.js';
import { createChatRouter } from './routes/chat.js';
import { createProductsRouter } from './routes/products.js';
import { createOrdersRouter } from './routes/orders.js';
import { createTicketsRouter } from './routes/tickets.js';
import { createReturnsRouter } from './routes/returns.js';
import { createShippingRouter } from './routes/shipping.js';
import { createKnowledgeBaseRouter } from './routes/knowledgeBase.js';

export interface AppDependencies {
    db: KyselyDB;
    knowledgeBase: KnowledgeBase;
    agent: ChatAgent;
    /** Allowed browser origin; any origin when unset */
    corsOrigin?: string;
}

export function createApp({ db, knowledgeBase, agent, corsOrigin }: AppDependencies): Express {
    const app = express();

    app.use(cors(corsOrigin ? { origin: corsOrigin } : undefined));
    app.use(express.json({ limit: '1mb' }));
    app.use(requestLogger);

    app.use('/api/health', createHealthRouter(db));
    app.use('/api/chat', createChatRouter(agent));
    app.use('/api/products', createProductsRouter(db));
    app.use('/api/orders', createOrdersRouter(db));
    app.use('/api/tickets', createTicketsRouter(db));
    app.use('/api/returns', createReturnsRouter(db));
    app.use('/api/shipping', createShippingRouter(db));
    app.use('/api/knowledge-base', createKnowledgeBaseRouter(knowledgeBase));

    app.use('/api', (req, res) => {
        res.status(404).json({ error: `No route for ${req.method} ${req.originalUrl}`, type: 'NotFoundError' });
    });

    // Must be last
    app.use(errorHandler);

    return app;
}
