/**
 * Knowledge Base
 *
 * Help-centre search backed by a Qdrant collection. Text search is a stub
 * until query embeddings are wired in: it filters the sample articles in
 * data/knowledge-base.json by keyword. The same file holds the standard
 * operating procedures the chat agent injects per tool.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { KnowledgeArticle, Procedure, ScoredArticle } from '@supportdesk/shared';
import { knowledgeBaseLogger as log } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';

// ============================================
// CONSTANTS
// ============================================

export const DEFAULT_SEARCH_LIMIT = 5;
const API_TIMEOUT_MS = 10000;

const DEFAULT_DATA_FILE = fileURLToPath(new URL('../../../data/knowledge-base.json', import.meta.url));

// ============================================
// TYPES
// ============================================

const knowledgeBaseDataSchema = z.object({
    articles: z.array(z.object({
        id: z.number().int(),
        score: z.number().min(0).max(1),
        title: z.string(),
        content: z.string(),
        category: z.string(),
        url: z.string(),
    })),
    procedures: z.array(z.object({
        tool: z.string(),
        title: z.string(),
        content: z.string(),
    })),
});

export type KnowledgeBaseData = z.infer<typeof knowledgeBaseDataSchema>;

const collectionResponseSchema = z.object({
    result: z.object({
        status: z.string().optional(),
        points_count: z.number().nullish(),
        vectors_count: z.number().nullish(),
    }),
});

export type CollectionInfo =
    | { status: 'disconnected'; message: string }
    | { status: 'connected'; name: string; pointsCount: number | null; vectorsCount: number | null }
    | { status: 'error'; message: string };

export interface KnowledgeBaseConfig {
    /** Qdrant base URL; search stays on the sample articles without it */
    url?: string;
    apiKey?: string;
    collection: string;
    /** Articles and procedures; defaults to data/knowledge-base.json */
    data?: KnowledgeBaseData;
    /** HTTP client override */
    http?: AxiosInstance;
}

export function loadKnowledgeBaseData(file: string = DEFAULT_DATA_FILE): KnowledgeBaseData {
    return knowledgeBaseDataSchema.parse(JSON.parse(readFileSync(file, 'utf-8')));
}

// ============================================
// CLIENT CLASS
// ============================================

export class KnowledgeBase {
    private readonly collection: string;
    private readonly data: KnowledgeBaseData;
    private readonly procedures: Map<string, Procedure>;
    private readonly client: AxiosInstance | null;

    constructor(config: KnowledgeBaseConfig) {
        this.collection = config.collection;
        this.data = config.data ?? loadKnowledgeBaseData();
        this.procedures = new Map(this.data.procedures.map(p => [p.tool, p]));
        this.client = config.http ?? (config.url ? createHttpClient(config.url, config.apiKey) : null);

        if (!this.client) {
            log.warn('Qdrant URL not configured; knowledge base search uses sample articles');
        }
    }

    get isConfigured(): boolean {
        return this.client !== null;
    }

    /**
     * Articles whose title or content contains any word of the query.
     * When nothing matches, every article is returned so the model still
     * gets general help-centre context.
     */
    async searchByText(query: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<ScoredArticle[]> {
        const words = query.toLowerCase().split(/\s+/).filter(Boolean);
        const all = this.data.articles;

        const matches = words.length === 0
            ? []
            : all.filter(article => {
                const title = article.title.toLowerCase();
                const content = article.content.toLowerCase();
                return words.some(word => title.includes(word) || content.includes(word));
            });

        const results = (matches.length > 0 ? matches : all).slice(0, limit);
        log.debug({ query, matched: matches.length, returned: results.length }, 'Knowledge base search');

        return results.map(({ score, ...article }) => ({ ...article, relevanceScore: score }));
    }

    /** Standard operating procedure for a chat tool */
    async getProcedure(tool: string): Promise<Procedure | undefined> {
        return this.procedures.get(tool);
    }

    listArticles(): KnowledgeArticle[] {
        return this.data.articles.map(({ score: _score, ...article }) => article);
    }

    async getCollectionInfo(): Promise<CollectionInfo> {
        if (!this.client) {
            return { status: 'disconnected', message: 'Qdrant client not configured' };
        }

        try {
            const response = await this.client.get(`/collections/${encodeURIComponent(this.collection)}`);
            const parsed = collectionResponseSchema.parse(response.data);
            return {
                status: 'connected',
                name: this.collection,
                pointsCount: parsed.result.points_count ?? null,
                vectorsCount: parsed.result.vectors_count ?? null,
            };
        } catch (error) {
            const message = axios.isAxiosError(error) && error.response
                ? `Qdrant responded with ${error.response.status}`
                : errorMessage(error);
            log.error({ collection: this.collection, error: message }, 'Failed to read collection info');
            return { status: 'error', message };
        }
    }
}

function createHttpClient(url: string, apiKey?: string): AxiosInstance {
    return axios.create({
        baseURL: url.replace(/\/+$/, ''),
        headers: {
            'Content-Type': 'application/json',
            ...(apiKey && { 'api-key': apiKey }),
        },
        timeout: API_TIMEOUT_MS,
    });
}
