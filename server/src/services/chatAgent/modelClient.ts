/**
 * Chat Agent - Anthropic completion client
 */

import Anthropic from '@anthropic-ai/sdk';
import type { CompletionClient, ModelContentBlock, ModelRequest, ModelResponse, ToolInput } from './types.js';

export interface AnthropicClientOptions {
    apiKey: string;
    model: string;
    maxTokens: number;
}

function isToolInput(value: unknown): value is ToolInput {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class AnthropicCompletionClient implements CompletionClient {
    private readonly client: Anthropic;

    constructor(private readonly options: AnthropicClientOptions) {
        this.client = new Anthropic({ apiKey: options.apiKey });
    }

    async complete(request: ModelRequest): Promise<ModelResponse> {
        const stream = this.client.messages.stream({
            model: this.options.model,
            max_tokens: this.options.maxTokens,
            system: request.system,
            tools: request.tools,
            tool_choice: { type: 'auto' },
            messages: request.messages,
        });

        const response = await stream.finalMessage();

        const content: ModelContentBlock[] = [];
        for (const block of response.content) {
            if (block.type === 'text') {
                content.push({ type: 'text', text: block.text });
            } else if (block.type === 'tool_use') {
                content.push({
                    type: 'tool_use',
                    id: block.id,
                    name: block.name,
                    input: isToolInput(block.input) ? block.input : {},
                });
            }
        }

        return { content, stopReason: response.stop_reason };
    }
}
