// src/services/tool/types.ts

export interface SearchResult {
    title: string;
    url: string;
    snippet: string;
    content: string;
}

export interface SearchTool {
    search(query: string, numResults?: number): Promise<SearchResult[]>;
}
