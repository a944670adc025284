import type { CompletionClient, ModelRequest, ModelResponse, ToolInput } from '../../services/chatAgent/types.js';

/** Replays canned model responses in order and records what it was sent */
export class ScriptedClient implements CompletionClient {
    readonly requests: ModelRequest[] = [];
    private next = 0;

    constructor(private readonly script: Array<ModelResponse | Error>) {}

    async complete(request: ModelRequest): Promise<ModelResponse> {
        // The loop keeps appending to the same array
        this.requests.push({ ...request, messages: [...request.messages] });

        const step = this.script[this.next++];
        if (step === undefined) throw new Error('Script exhausted');
        if (step instanceof Error) throw step;
        return step;
    }
}

export function textResponse(value: string): ModelResponse {
    return { content: [{ type: 'text', text: value }], stopReason: 'end_turn' };
}

export function toolUseResponse(id: string, name: string, input: ToolInput, preamble?: string): ModelResponse {
    return {
        content: [
            ...(preamble ? [{ type: 'text' as const, text: preamble }] : []),
            { type: 'tool_use', id, name, input },
        ],
        stopReason: 'tool_use',
    };
}
