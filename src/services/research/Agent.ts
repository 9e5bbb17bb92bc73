// src/services/research/Agent.ts

import { v4 as uuidv4 } from 'uuid';
import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import type { InferenceClient } from '../inference/types';
import type { ChatTurn, TokenUsage } from '../../models/chat.model';
import type { SearchTool } from '../tool/types';
import { errorMessage } from '../../errors';
import type { OutputSpec } from './output';

export interface ModelSettings {
    temperature?: number;
    maxTokens?: number;
    topP?: number;
}

export interface AgentConfig<T> extends ServiceConfig {
    name: string;
    instructions: string;
    inference: InferenceClient;
    output: OutputSpec<T>;
    model?: string;
    settings?: ModelSettings;
    searchTool?: SearchTool;
}

export interface AgentResult<T> {
    finalOutput: T;
    usage: TokenUsage;
    traceId: string;
}

const SEARCH_RESULTS_PER_TASK = 3;
const SEARCH_TERM_MARKER = 'Search term:';

export class Agent<T> extends BaseService {
    public readonly name: string;
    private instructions: string;
    private inference: InferenceClient;
    private output: OutputSpec<T>;
    private model?: string;
    private settings: ModelSettings;
    private searchTool?: SearchTool;

    constructor(config: AgentConfig<T>) {
        super(config);
        this.name = config.name;
        this.instructions = config.instructions;
        this.inference = config.inference;
        this.output = config.output;
        this.model = config.model;
        this.settings = config.settings ?? {};
        this.searchTool = config.searchTool;
    }

    public async run(task: string, context?: Record<string, unknown>): Promise<AgentResult<T>> {
        const traceId = uuidv4();
        const startedAt = Date.now();
        this.logger.info('Agent run started', { agent: this.name, traceId });

        try {
            const messages = await this.buildMessages(task, context);
            const generated = await this.inference.generate(messages, {
                model: this.model,
                temperature: this.settings.temperature,
                maxTokens: this.settings.maxTokens,
                topP: this.settings.topP,
            });
            const finalOutput = this.output.parse(generated.content);

            this.logger.info('Agent run finished', { agent: this.name, traceId, durationMs: Date.now() - startedAt });
            return { finalOutput, usage: generated.usage, traceId };
        } catch (error) {
            this.logger.error('Agent run failed', {
                agent: this.name,
                traceId,
                durationMs: Date.now() - startedAt,
                error: errorMessage(error),
            });
            throw error;
        }
    }

    public async buildMessages(task: string, context?: Record<string, unknown>): Promise<ChatTurn[]> {
        const messages: ChatTurn[] = [{ role: 'system', content: this.instructions }];

        if (context) {
            messages.push({ role: 'user', content: `Context: ${JSON.stringify(context)}` });
        }

        messages.push({ role: 'user', content: task });

        if (this.searchTool) {
            const results = await this.searchTool.search(searchTermFromTask(task), SEARCH_RESULTS_PER_TASK);
            if (results.length > 0) {
                messages.push({ role: 'system', content: `Search results:\n${JSON.stringify(results, null, 2)}` });
            }
        }

        if (this.output.instruction) {
            messages.push({ role: 'system', content: this.output.instruction });
        }

        return messages;
    }
}

/** Text after `Search term:` up to the end of that line, else the first 100 characters. */
export function searchTermFromTask(task: string): string {
    const markerAt = task.lastIndexOf(SEARCH_TERM_MARKER);
    const afterMarker = markerAt >= 0 ? task.slice(markerAt + SEARCH_TERM_MARKER.length) : task;
    const term = afterMarker.split('\n')[0].trim();
    return term || task.slice(0, 100);
}
