/**
 * Chat Agent - Bounded tool-calling loop
 *
 * One user turn: send the conversation to the model, execute every tool it
 * asks for, feed the results back, and repeat until it answers without tools
 * or the call budget runs out.
 */

import type Anthropic from '@anthropic-ai/sdk';
import { chatLogger as log } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type {
    ChatMessage,
    ChatStreamChunk,
    ChatTurnResult,
    CompletionClient,
    ModelContentBlock,
    ToolCallRecord,
    ToolContext,
} from './types.js';
import {
    EMPTY_RESPONSE_REPLY,
    MAX_ITERATIONS_REPLY,
    MAX_LOOP_ITERATIONS,
    MISSING_API_KEY_MESSAGE,
    SYSTEM_PROMPT,
    TOOLS,
} from './tools.js';
import { executeTool } from './executor.js';
import { ProcedureInjector } from './procedures.js';

export interface ChatAgentOptions extends ToolContext {
    /** null when no API key is configured */
    client: CompletionClient | null;
    maxIterations?: number;
    systemPrompt?: string;
}

type ToolUseBlock = Extract<ModelContentBlock, { type: 'tool_use' }>;

function isToolUse(block: ModelContentBlock): block is ToolUseBlock {
    return block.type === 'tool_use';
}

function toBlockParam(block: ModelContentBlock): Anthropic.Messages.ContentBlockParam {
    if (block.type === 'text') {
        return { type: 'text', text: block.text };
    }
    return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
}

export class ChatAgent {
    private readonly client: CompletionClient | null;
    private readonly tools: ToolContext;
    private readonly procedures: ProcedureInjector;
    private readonly maxIterations: number;
    private readonly systemPrompt: string;

    constructor(options: ChatAgentOptions) {
        this.client = options.client;
        this.tools = { db: options.db, knowledgeBase: options.knowledgeBase };
        this.procedures = new ProcedureInjector(options.knowledgeBase);
        this.maxIterations = options.maxIterations ?? MAX_LOOP_ITERATIONS;
        this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
    }

    /** Tools whose procedures have been looked up so far */
    get cachedProcedureTools(): string[] {
        return this.procedures.cachedTools;
    }

    /**
     * Run one turn, yielding tool results as they complete and the reply at the end.
     *
     * @param message - The user's new message
     * @param history - Earlier turns of the conversation, oldest first
     */
    async *streamChat(message: string, history: readonly ChatMessage[] = []): AsyncGenerator<ChatStreamChunk> {
        if (!this.client) {
            yield { type: 'error', message: MISSING_API_KEY_MESSAGE };
            yield { type: 'done' };
            return;
        }

        const system = await this.procedures.buildSystemPrompt(this.systemPrompt, message);
        const messages: Anthropic.Messages.MessageParam[] = [
            ...history.map(turn => ({ role: turn.role, content: turn.content })),
            { role: 'user', content: message },
        ];

        for (let iteration = 0; iteration < this.maxIterations; iteration++) {
            let content: ModelContentBlock[];
            try {
                ({ content } = await this.client.complete({ system, messages, tools: TOOLS }));
            } catch (error: unknown) {
                const reason = errorMessage(error);
                log.error({ error: reason, iteration }, 'Model call failed');
                yield { type: 'error', message: reason };
                yield { type: 'done' };
                return;
            }

            const toolUses = content.filter(isToolUse);

            if (toolUses.length === 0) {
                const text = content
                    .flatMap(block => (block.type === 'text' ? [block.text] : []))
                    .join('')
                    .trim();
                yield { type: 'text_delta', text: text || EMPTY_RESPONSE_REPLY };
                yield { type: 'done' };
                return;
            }

            // Assistant turn first, then every result in a single user turn
            messages.push({ role: 'assistant', content: content.map(toBlockParam) });

            const results: Anthropic.Messages.ToolResultBlockParam[] = [];
            for (const call of toolUses) {
                const result = await executeTool(call.name, call.input, this.tools);
                yield { type: 'tool_result', toolName: call.name, arguments: call.input, result };
                results.push({
                    type: 'tool_result',
                    tool_use_id: call.id,
                    content: JSON.stringify(result),
                    ...(!result.success && { is_error: true }),
                });
            }

            messages.push({ role: 'user', content: results });
        }

        log.warn({ maxIterations: this.maxIterations }, 'Chat turn hit the model call limit');
        yield { type: 'text_delta', text: MAX_ITERATIONS_REPLY };
        yield { type: 'done' };
    }

    /** Run one turn to completion */
    async chat(message: string, history: readonly ChatMessage[] = []): Promise<ChatTurnResult> {
        return collectChatTurn(this.streamChat(message, history));
    }
}

/**
 * Fold a chunk stream into the reply and the tool-call log.
 * An error chunk becomes the reply `Error: <message>`.
 */
export async function collectChatTurn(chunks: AsyncIterable<ChatStreamChunk>): Promise<ChatTurnResult> {
    let reply = '';
    const toolCalls: ToolCallRecord[] = [];

    for await (const chunk of chunks) {
        switch (chunk.type) {
            case 'text_delta':
                reply += chunk.text;
                break;
            case 'tool_result':
                toolCalls.push({ tool: chunk.toolName, arguments: chunk.arguments, result: chunk.result });
                break;
            case 'error':
                reply = `Error: ${chunk.message}`;
                break;
            case 'done':
                break;
        }
    }

    return { reply, toolCalls };
}

/**
 * Render a tool-call log for people, one numbered line per call.
 *
 * @example
 * formatToolCalls([{ tool: 'order_status', arguments: { orderId: 3 }, result: { success: true, message: 'Order #3 status: shipped' } }])
 * // '1. order_status {"orderId":3} -> Order #3 status: shipped'
 */
export function formatToolCalls(toolCalls: readonly ToolCallRecord[]): string {
    if (toolCalls.length === 0) return 'No tools were used.';

    return toolCalls
        .map((call, i) => {
            const outcome = call.result.success ? call.result.message : `failed: ${call.result.error}`;
            return `${i + 1}. ${call.tool} ${JSON.stringify(call.arguments)} -> ${outcome}`;
        })
        .join('\n');
}
