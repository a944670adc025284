import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { KnowledgeBase, loadKnowledgeBaseData } from '../index.js';
import { KNOWLEDGE_BASE_DATA, createTestKnowledgeBase } from '../../../__tests__/helpers/testDb.js';

function httpWith(adapter: AxiosAdapter) {
    return axios.create({ baseURL: 'http://qdrant.test', adapter });
}

describe('KnowledgeBase', () => {
    describe('searchByText', () => {
        const kb = createTestKnowledgeBase();

        it('matches any query word in the title or content', async () => {
            expect(await kb.searchByText('Return POLICY')).toEqual([{
                id: 1,
                title: 'Return Policy',
                content: 'Returns are accepted within 30 days of delivery.',
                category: 'returns',
                url: '/help/returns',
                relevanceScore: 0.9,
            }]);
        });

        it('returns every article when nothing matches', async () => {
            expect((await kb.searchByText('gift cards')).map(a => a.id)).toEqual([1, 2]);
        });

        it('caps the number of results', async () => {
            expect(await kb.searchByText('delivery', 1)).toHaveLength(1);
        });
    });

    it('looks up procedures by tool name', async () => {
        const kb = createTestKnowledgeBase();
        expect(await kb.getProcedure('estimate_shipping')).toEqual({
            tool: 'estimate_shipping',
            title: 'Quoting shipping',
            content: 'Ask for the destination ZIP code.',
        });
        expect(await kb.getProcedure('draft_order')).toBeUndefined();
    });

    it('ships a procedure for every chat tool', () => {
        const tools = loadKnowledgeBaseData().procedures.map(p => p.tool).sort();
        expect(tools).toEqual([
            'check_inventory',
            'create_order',
            'create_support_ticket',
            'draft_order',
            'estimate_shipping',
            'initiate_return',
            'order_status',
            'product_catalog',
            'search_knowledge_base',
        ]);
    });

    describe('getCollectionInfo', () => {
        it('reports disconnected without a URL', async () => {
            expect(await createTestKnowledgeBase().getCollectionInfo()).toEqual({
                status: 'disconnected',
                message: 'Qdrant client not configured',
            });
        });

        it('reads the collection size', async () => {
            const requested: Array<string | undefined> = [];
            const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
                requested.push(config.url);
                return {
                    data: { result: { status: 'green', points_count: 42, vectors_count: 42 }, status: 'ok' },
                    status: 200,
                    statusText: 'OK',
                    headers: {},
                    config,
                };
            };
            const kb = new KnowledgeBase({ collection: 'support_articles', data: KNOWLEDGE_BASE_DATA, http: httpWith(adapter) });

            expect(kb.isConfigured).toBe(true);
            expect(await kb.getCollectionInfo()).toEqual({
                status: 'connected',
                name: 'support_articles',
                pointsCount: 42,
                vectorsCount: 42,
            });
            expect(requested).toEqual(['/collections/support_articles']);
        });

        it('reports an error status from the server', async () => {
            const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
                throw new AxiosError('Request failed', 'ERR_BAD_RESPONSE', config, null, {
                    data: {},
                    status: 503,
                    statusText: 'Service Unavailable',
                    headers: {},
                    config,
                });
            };
            const kb = new KnowledgeBase({ collection: 'support_articles', data: KNOWLEDGE_BASE_DATA, http: httpWith(adapter) });

            expect(await kb.getCollectionInfo()).toEqual({ status: 'error', message: 'Qdrant responded with 503' });
        });
    });
});
