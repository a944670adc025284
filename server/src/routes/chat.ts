/**
 * Chat Agent Routes
 *
 * POST /api/chat           - Run one turn, respond with the reply and tool-call log
 * POST /api/chat/message   - Run one turn as server-sent events
 * GET  /api/chat/welcome   - Greeting shown when a session opens
 * GET  /api/chat/tools     - Tool names and descriptions
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { typedRoute } from '../middleware/asyncHandler.js';
import {
    TOOLS,
    MUTATING_TOOLS,
    WELCOME_MESSAGE,
    isToolName,
    type ChatAgent,
} from '../services/chatAgent/index.js';
import { routeLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const log = routeLogger.child({ router: 'chat' });

// ============================================
// VALIDATION SCHEMAS
// ============================================

const ChatPayloadSchema = z.object({
    message: z.string().trim().min(1, 'Message is required'),
    history: z.array(z.object({
        role: z.enum(['user', 'assistant']),
        content: z.string(),
    })).default([]),
});

export function createChatRouter(agent: ChatAgent): Router {
    const router: Router = Router();

    // ============================================
    // POST / - Complete turn as JSON
    // ============================================

    router.post('/', typedRoute(ChatPayloadSchema, async ({ message, history }, _req, res) => {
        log.info({ historyLength: history.length }, 'Chat message received');
        const result = await agent.chat(message, history);
        res.json(result);
    }));

    // ============================================
    // POST /message - Stream chat response (SSE)
    // ============================================

    router.post('/message', typedRoute(ChatPayloadSchema, async ({ message, history }, _req: Request, res: Response) => {
        log.info({ historyLength: history.length }, 'Chat stream requested');

        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no');

        try {
            for await (const chunk of agent.streamChat(message, history)) {
                res.write(`data: ${JSON.stringify(chunk)}\n\n`);
            }
        } catch (error: unknown) {
            const reason = errorMessage(error);
            log.error({ error: reason }, 'Chat stream failed');
            res.write(`data: ${JSON.stringify({ type: 'error', message: reason })}\n\n`);
            res.write(`data: ${JSON.stringify({ type: 'done' })}\n\n`);
        }

        res.end();
    }));

    // ============================================
    // GET /welcome, GET /tools
    // ============================================

    router.get('/welcome', (_req: Request, res: Response) => {
        res.json({ message: WELCOME_MESSAGE });
    });

    router.get('/tools', (_req: Request, res: Response) => {
        res.json({
            tools: TOOLS.map(tool => ({
                name: tool.name,
                description: tool.description ?? '',
                mutating: isToolName(tool.name) && MUTATING_TOOLS.has(tool.name),
            })),
        });
    });

    return router;
}
