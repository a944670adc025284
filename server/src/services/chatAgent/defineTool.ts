/**
 * Chat Agent - Tool executor helper
 */

import type { z } from 'zod';
import type { ToolContext, ToolInput, ToolResult } from './types.js';

export type ToolExecutor = (input: ToolInput, ctx: ToolContext) => Promise<ToolResult>;

/**
 * Bind an argument schema to a tool body. Invalid arguments throw the
 * ZodError, which the executor reports back to the model.
 */
export function defineTool<S extends z.ZodTypeAny>(
    schema: S,
    run: (args: z.output<S>, ctx: ToolContext) => Promise<ToolResult>,
): ToolExecutor {
    return async (input, ctx) => run(schema.parse(input), ctx);
}

export function fail(error: string): ToolResult {
    return { success: false, error };
}
