/**
 * Chat Agent - Procedure injection
 *
 * Guesses from the user's message which tools the model is about to need and
 * appends the store's procedures for those tools to the system prompt.
 */

import type { Procedure } from '@supportdesk/shared';
import { chatLogger as log } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { ToolName } from './tools.js';

export const PROCEDURES_HEADING = 'RELEVANT PROCEDURES';

interface KeywordRule {
    pattern: RegExp;
    tools: ToolName[];
}

const KEYWORD_RULES: KeywordRule[] = [
    { pattern: /\b(return|returning|refund|send (it )?back)\b/i, tools: ['order_status', 'initiate_return'] },
    {
        pattern: /\b(place|make|create|put in) an? (new )?order\b|\b(buy|purchase)\b/i,
        tools: ['draft_order', 'create_order'],
    },
    { pattern: /\bwhere is my order\b|\b(track|tracking|status)\b|\border\s*#?\d+/i, tools: ['order_status'] },
    { pattern: /\b(ship|shipping|delivery cost|postage)\b/i, tools: ['estimate_shipping'] },
    { pattern: /\b(show|list|browse|catalog|catalogue|recommend)\b/i, tools: ['product_catalog'] },
    { pattern: /\b(in stock|stock|inventory|availability|available)\b/i, tools: ['check_inventory'] },
    {
        pattern: /\b(broken|defective|damaged|not working|stopped working|complaint|ticket)\b/i,
        tools: ['create_support_ticket'],
    },
    { pattern: /\b(policy|policies|warranty|payment|pay with)\b/i, tools: ['search_knowledge_base'] },
];

/** Tools the message suggests, in rule order, without duplicates */
export function detectLikelyTools(message: string): ToolName[] {
    const tools: ToolName[] = [];
    for (const rule of KEYWORD_RULES) {
        if (!rule.pattern.test(message)) continue;
        for (const tool of rule.tools) {
            if (!tools.includes(tool)) tools.push(tool);
        }
    }
    return tools;
}

export function formatProcedures(procedures: readonly Procedure[]): string {
    const sections = procedures.map(p => `### ${p.title} (${p.tool})\n${p.content}`);
    return `${PROCEDURES_HEADING}:\n\n${sections.join('\n\n')}`;
}

export interface ProcedureSource {
    getProcedure(tool: string): Promise<Procedure | undefined>;
}

/**
 * Looks procedures up once per tool and keeps them for the life of the
 * injector. A lookup that throws is logged and retried on the next turn.
 */
export class ProcedureInjector {
    private readonly cache = new Map<string, Procedure | null>();

    constructor(private readonly source: ProcedureSource) {}

    get cachedTools(): string[] {
        return [...this.cache.keys()];
    }

    async proceduresFor(message: string): Promise<Procedure[]> {
        const procedures: Procedure[] = [];

        for (const tool of detectLikelyTools(message)) {
            const procedure = await this.lookup(tool);
            if (procedure) procedures.push(procedure);
        }

        return procedures;
    }

    /** The base prompt, followed by the procedures relevant to the message */
    async buildSystemPrompt(basePrompt: string, message: string): Promise<string> {
        const procedures = await this.proceduresFor(message);
        if (procedures.length === 0) return basePrompt;

        log.debug({ tools: procedures.map(p => p.tool) }, 'Injecting procedures');
        return `${basePrompt}\n\n${formatProcedures(procedures)}`;
    }

    private async lookup(tool: string): Promise<Procedure | null> {
        const cached = this.cache.get(tool);
        if (cached !== undefined) return cached;

        try {
            const procedure = (await this.source.getProcedure(tool)) ?? null;
            this.cache.set(tool, procedure);
            return procedure;
        } catch (error) {
            log.warn({ tool, error: errorMessage(error) }, 'Procedure lookup failed');
            return null;
        }
    }
}
