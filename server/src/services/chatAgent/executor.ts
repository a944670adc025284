/**
 * Chat Agent - Tool executor map and dispatch
 *
 * Tool calls never throw to the chat loop. Every failure becomes
 * `{ success: false, error }` so the model can explain it or try again.
 */

import { ZodError } from 'zod';
import { chatLogger as log } from '../../utils/logger.js';
import { errorMessage, isCustomError } from '../../utils/errors.js';
import type { ToolContext, ToolInput, ToolResult } from './types.js';
import { isToolName, type ToolName } from './tools.js';
import type { ToolExecutor } from './defineTool.js';
import {
    execCheckInventory,
    execDraftOrder,
    execEstimateShipping,
    execOrderStatus,
    execProductCatalog,
    execSearchKnowledgeBase,
} from './readTools.js';
import { execCreateOrder, execCreateSupportTicket, execInitiateReturn } from './mutatingTools.js';

// ============================================
// TOOL ROUTER
// ============================================

/** Map of tool name -> executor function */
export const TOOL_EXECUTORS: Record<ToolName, ToolExecutor> = {
    draft_order: execDraftOrder,
    order_status: execOrderStatus,
    product_catalog: execProductCatalog,
    check_inventory: execCheckInventory,
    estimate_shipping: execEstimateShipping,
    search_knowledge_base: execSearchKnowledgeBase,
    create_order: execCreateOrder,
    create_support_ticket: execCreateSupportTicket,
    initiate_return: execInitiateReturn,
};

function describeIssues(error: ZodError): string {
    return error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

// ============================================
// EXECUTE
// ============================================

/**
 * Run one tool call.
 *
 * - unknown tool: `Unknown tool: <name>`
 * - bad arguments: `Invalid arguments for <name>: <issues>`
 * - store rule or lookup failures keep their own message
 * - anything else: `Error executing <name>: <message>`
 */
export async function executeTool(name: string, input: ToolInput, ctx: ToolContext): Promise<ToolResult> {
    if (!isToolName(name)) {
        log.warn({ toolName: name }, 'Model requested an unknown tool');
        return { success: false, error: `Unknown tool: ${name}` };
    }

    log.info({ toolName: name, toolInput: input }, 'Executing tool');

    try {
        const result = await TOOL_EXECUTORS[name](input, ctx);
        if (!result.success) {
            log.info({ toolName: name, error: result.error }, 'Tool reported failure');
        }
        return result;
    } catch (error: unknown) {
        if (error instanceof ZodError) {
            return { success: false, error: `Invalid arguments for ${name}: ${describeIssues(error)}` };
        }
        if (isCustomError(error)) {
            log.info({ toolName: name, error: error.message }, 'Tool rejected request');
            return { success: false, error: error.message };
        }

        const message = errorMessage(error);
        log.error({ toolName: name, toolInput: input, error: message }, 'Tool execution failed');
        return { success: false, error: `Error executing ${name}: ${message}` };
    }
}
