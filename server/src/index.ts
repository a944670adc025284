/**
 * Support desk API server
 */

import { env } from './config/env.js';
import logger from './utils/logger.js';
import { createKysely, destroyKysely } from './db/index.js';
import { KnowledgeBase } from './services/knowledgeBase/index.js';
import { createChatAgent } from './services/chatAgent/index.js';
import { createApp } from './app.js';

const db = createKysely(env.DATABASE_URL);

const knowledgeBase = new KnowledgeBase({
    url: env.QDRANT_URL,
    apiKey: env.QDRANT_API_KEY,
    collection: env.QDRANT_COLLECTION,
});

const agent = createChatAgent(db, knowledgeBase);

const app = createApp({
    db,
    knowledgeBase,
    agent,
    corsOrigin: env.NODE_ENV === 'production' ? env.CORS_ORIGIN : undefined,
});

const server = app.listen(env.PORT, () => {
    logger.info({
        port: env.PORT,
        env: env.NODE_ENV,
        model: env.AI_MODEL,
        chatEnabled: Boolean(env.ANTHROPIC_API_KEY),
        knowledgeBase: knowledgeBase.isConfigured ? 'qdrant' : 'sample articles',
    }, 'Support desk API listening');
});

// ============================================
// GRACEFUL SHUTDOWN
// ============================================

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    await new Promise<void>((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
    });
    await destroyKysely();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
        shutdown(signal)
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error({ err: error }, 'Shutdown failed');
                process.exit(1);
            });
    });
}
