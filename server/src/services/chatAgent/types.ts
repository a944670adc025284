/**
 * Chat Agent Types
 */

import type Anthropic from '@anthropic-ai/sdk';
import type { KyselyDB } from '../../db/index.js';
import type { KnowledgeBase } from '../knowledgeBase/index.js';

/** Generic tool input type */
export type ToolInput = Record<string, unknown>;

/** Outcome of one tool call, returned to the model as JSON */
export type ToolResult =
    | { success: true; message: string; [key: string]: unknown }
    | { success: false; error: string };

/** Chunks yielded by the chat loop (sent to clients as SSE) */
export type ChatStreamChunk =
    | { type: 'text_delta'; text: string }
    | { type: 'tool_result'; toolName: string; arguments: ToolInput; result: ToolResult }
    | { type: 'error'; message: string }
    | { type: 'done' };

/** Prior conversation turn as sent by a client */
export interface ChatMessage {
    role: 'user' | 'assistant';
    content: string;
}

export interface ToolCallRecord {
    tool: string;
    arguments: ToolInput;
    result: ToolResult;
}

export interface ChatTurnResult {
    reply: string;
    toolCalls: ToolCallRecord[];
}

/** What tool executors may touch */
export interface ToolContext {
    db: KyselyDB;
    knowledgeBase: KnowledgeBase;
}

// ============================================
// MODEL SEAM
// ============================================

export type ModelContentBlock =
    | { type: 'text'; text: string }
    | { type: 'tool_use'; id: string; name: string; input: ToolInput };

export interface ModelResponse {
    content: ModelContentBlock[];
    stopReason: string | null;
}

export interface ModelRequest {
    system: string;
    messages: Anthropic.Messages.MessageParam[];
    tools: Anthropic.Messages.Tool[];
}

/** One model call. Implemented over the Anthropic SDK; tests script it. */
export interface CompletionClient {
    complete(request: ModelRequest): Promise<ModelResponse>;
}
