import type { Procedure } from '@supportdesk/shared';
import { ProcedureInjector, detectLikelyTools, formatProcedures } from '../procedures.js';

describe('detectLikelyTools', () => {
    it.each([
        ['I want to return my keyboard', ['order_status', 'initiate_return']],
        ["I'd like to place an order", ['draft_order', 'create_order']],
        ['How much to ship to 10001?', ['estimate_shipping']],
        ['Show me all headphones', ['product_catalog']],
        ['Where is my order #123?', ['order_status']],
        ['Is the Forge keyboard in stock?', ['check_inventory']],
        ['My speaker stopped working, what does the warranty cover?', ['create_support_ticket', 'search_knowledge_base']],
        ['Hello there', []],
    ])('%s', (message, expected) => {
        expect(detectLikelyTools(message)).toEqual(expected);
    });

    it('lists each tool once', () => {
        expect(detectLikelyTools('Refund for order #12, and what is the return status?')).toEqual([
            'order_status',
            'initiate_return',
        ]);
    });
});

describe('formatProcedures', () => {
    it('renders a heading and one section per procedure', () => {
        expect(formatProcedures([
            { tool: 'estimate_shipping', title: 'Quoting shipping', content: 'Ask for the ZIP code.' },
            { tool: 'check_inventory', title: 'Checking stock', content: 'Give exact counts.' },
        ])).toBe(
            'RELEVANT PROCEDURES:\n\n'
            + '### Quoting shipping (estimate_shipping)\nAsk for the ZIP code.\n\n'
            + '### Checking stock (check_inventory)\nGive exact counts.'
        );
    });
});

describe('ProcedureInjector', () => {
    const shipping: Procedure = { tool: 'estimate_shipping', title: 'Quoting shipping', content: 'Ask for the ZIP code.' };

    function sourceOf(procedures: Procedure[]) {
        const lookup = vi.fn(async (tool: string) => procedures.find(p => p.tool === tool));
        return { getProcedure: lookup, lookup };
    }

    it('appends procedures to the base prompt', async () => {
        const injector = new ProcedureInjector(sourceOf([shipping]));

        expect(await injector.buildSystemPrompt('BASE', 'How much to ship?')).toBe(
            'BASE\n\nRELEVANT PROCEDURES:\n\n### Quoting shipping (estimate_shipping)\nAsk for the ZIP code.'
        );
    });

    it('leaves the prompt alone when nothing applies', async () => {
        const injector = new ProcedureInjector(sourceOf([shipping]));
        expect(await injector.buildSystemPrompt('BASE', 'Hello')).toBe('BASE');
    });

    it('looks each tool up once, including tools without a procedure', async () => {
        const source = sourceOf([shipping]);
        const injector = new ProcedureInjector(source);

        await injector.proceduresFor('How much to ship?');
        await injector.proceduresFor('Shipping to 94105 please');
        await injector.proceduresFor('Show me the catalog');
        await injector.proceduresFor('Browse the catalog');

        expect(source.lookup).toHaveBeenCalledTimes(2);
        expect(injector.cachedTools).toEqual(['estimate_shipping', 'product_catalog']);
    });

    it('retries a lookup that failed', async () => {
        const getProcedure = vi.fn<(tool: string) => Promise<Procedure | undefined>>()
            .mockRejectedValueOnce(new Error('store offline'))
            .mockResolvedValueOnce(shipping);
        const injector = new ProcedureInjector({ getProcedure });

        expect(await injector.proceduresFor('How much to ship?')).toEqual([]);
        expect(await injector.proceduresFor('How much to ship?')).toEqual([shipping]);
        expect(getProcedure).toHaveBeenCalledTimes(2);
    });
});
