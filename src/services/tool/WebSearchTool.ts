// src/services/tool/WebSearchTool.ts

import axios, { type AxiosInstance } from 'axios';
import sanitizeHtml from 'sanitize-html';
import { decodeHTML } from 'entities';
import { z } from 'zod';
import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import { SearchError, errorMessage } from '../../errors';
import type { SearchResult, SearchTool } from './types';

const SERPAPI_URL = 'https://serpapi.com/search';
const FETCH_TIMEOUT_MS = 10_000;
export const MAX_CONTENT_LENGTH = 2000;

const serpApiResponseSchema = z.object({
    organic_results: z
        .array(
            z.object({
                title: z.string().optional(),
                link: z.string().optional(),
                snippet: z.string().optional(),
            })
        )
        .optional(),
});

export interface WebSearchToolConfig extends ServiceConfig {
    apiKey?: string;
    maxResults?: number;
    http?: AxiosInstance;
}

export class WebSearchTool extends BaseService implements SearchTool {
    private apiKey?: string;
    private maxResults: number;
    private http: AxiosInstance;

    constructor(config: WebSearchToolConfig) {
        super(config);
        this.apiKey = config.apiKey || undefined;
        this.maxResults = config.maxResults ?? 5;
        this.http = config.http ?? axios.create();
    }

    public async search(query: string, numResults: number = this.maxResults): Promise<SearchResult[]> {
        if (!this.apiKey) {
            throw new SearchError('SERPAPI_API_KEY is required for web search');
        }
        this.logger.info('Web search', { query, numResults });

        let listings: z.infer<typeof serpApiResponseSchema>;
        try {
            const response = await this.http.get<unknown>(SERPAPI_URL, {
                params: { q: query, api_key: this.apiKey, num: numResults, engine: 'google' },
            });
            listings = serpApiResponseSchema.parse(response.data);
        } catch (error) {
            throw new SearchError(`Search request failed: ${errorMessage(error)}`, { cause: error });
        }

        const organic = (listings.organic_results ?? []).slice(0, numResults);
        return Promise.all(
            organic.map(async (item) => {
                const url = item.link ?? '';
                return {
                    title: item.title ?? '',
                    url,
                    snippet: item.snippet ?? '',
                    content: url ? await this.fetchContent(url) : '',
                };
            })
        );
    }

    /** Page text with markup removed, whitespace collapsed and truncated. Empty on any failure. */
    public async fetchContent(url: string): Promise<string> {
        try {
            const response = await this.http.get<string>(url, {
                timeout: FETCH_TIMEOUT_MS,
                responseType: 'text',
                headers: { 'User-Agent': 'Mozilla/5.0 (compatible; ResearchBot/1.0)' },
            });
            if (response.status !== 200 || typeof response.data !== 'string') return '';
            return htmlToText(response.data).slice(0, MAX_CONTENT_LENGTH);
        } catch (error) {
            this.logger.warn('Failed to fetch page content', { url, error: errorMessage(error) });
            return '';
        }
    }
}

export function htmlToText(html: string): string {
    const stripped = sanitizeHtml(html, {
        allowedTags: [],
        allowedAttributes: {},
        nonTextTags: ['script', 'style', 'noscript', 'textarea', 'option'],
    });
    // sanitize-html re-escapes the text it keeps
    return decodeHTML(stripped).replace(/\s+/g, ' ').trim();
}
