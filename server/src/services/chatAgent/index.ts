/**
 * Chat Agent Service
 *
 * Customer-support agent over the Anthropic Messages API. The model answers
 * by calling the store's tools (catalogue, orders, shipping, tickets,
 * returns, knowledge base); results are fed back until it replies in text.
 */

import { env } from '../../config/env.js';
import type { KyselyDB } from '../../db/index.js';
import type { KnowledgeBase } from '../knowledgeBase/index.js';
import { ChatAgent } from './agent.js';
import { AnthropicCompletionClient } from './modelClient.js';

export type {
    ChatMessage,
    ChatStreamChunk,
    ChatTurnResult,
    CompletionClient,
    ModelResponse,
    ToolCallRecord,
    ToolResult,
} from './types.js';
export { ChatAgent, collectChatTurn, formatToolCalls } from './agent.js';
export { executeTool } from './executor.js';
export { detectLikelyTools } from './procedures.js';
export { TOOLS, MUTATING_TOOLS, WELCOME_MESSAGE, MAX_LOOP_ITERATIONS, isToolName } from './tools.js';

/** Agent wired to the configured Anthropic account */
export function createChatAgent(db: KyselyDB, knowledgeBase: KnowledgeBase): ChatAgent {
    const client = env.ANTHROPIC_API_KEY
        ? new AnthropicCompletionClient({
            apiKey: env.ANTHROPIC_API_KEY,
            model: env.AI_MODEL,
            maxTokens: env.AI_MAX_TOKENS,
        })
        : null;

    return new ChatAgent({ client, db, knowledgeBase });
}
