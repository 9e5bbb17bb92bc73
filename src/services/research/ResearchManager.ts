// src/services/research/ResearchManager.ts

import { v4 as uuidv4 } from 'uuid';
import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import type { Agent } from './Agent';
import type { ReportData } from './agents';
import type { ResearchPlanner, WebSearchItem, WebSearchPlan } from './ResearchPlanner';
import { SearchError, errorMessage } from '../../errors';

export interface ResearchManagerConfig extends ServiceConfig {
    planner: ResearchPlanner;
    searchAgent: Agent<string>;
    writerAgent: Agent<ReportData>;
    emailAgent: Agent<string>;
}

export const EMPTY_QUERY_MESSAGE = 'Please enter a research query.';

/**
 * Drives one research run: plan, search, write, draft the email. Progress is
 * reported as it happens; the final chunk is the markdown report.
 */
export class ResearchManager extends BaseService {
    private planner: ResearchPlanner;
    private searchAgent: Agent<string>;
    private writerAgent: Agent<ReportData>;
    private emailAgent: Agent<string>;

    constructor(config: ResearchManagerConfig) {
        super(config);
        this.planner = config.planner;
        this.searchAgent = config.searchAgent;
        this.writerAgent = config.writerAgent;
        this.emailAgent = config.emailAgent;
    }

    public async *run(query: string): AsyncGenerator<string> {
        if (!query.trim()) {
            yield EMPTY_QUERY_MESSAGE;
            return;
        }

        const runId = uuidv4();
        this.logger.info('Research run started', { runId, query });
        yield `Starting research (run ${runId})`;

        yield 'Planning searches...';
        const plan = await this.planSearches(query);
        yield `Will perform ${plan.searches.length} searches`;

        const summaries = await this.performSearches(plan);
        yield `Searches complete: ${summaries.length}/${plan.searches.length}`;
        if (summaries.length === 0) {
            this.logger.error('Research run aborted, every search failed', { runId });
            throw new SearchError(`All ${plan.searches.length} searches failed; nothing to write a report from`);
        }

        yield 'Thinking about report...';
        const report = await this.writeReport(query, summaries);
        yield 'Report written';

        const email = await this.composeEmail(report);
        yield `Email draft:\n\n${email}`;

        this.logger.info('Research run finished', { runId });
        yield report.markdown_report;
    }

    public async planSearches(query: string): Promise<WebSearchPlan> {
        return this.planner.plan(query);
    }

    /** Runs every search concurrently. Failed searches are logged and left out. */
    public async performSearches(plan: WebSearchPlan): Promise<string[]> {
        const settled = await Promise.allSettled(plan.searches.map((item) => this.search(item)));
        const summaries: string[] = [];
        settled.forEach((outcome, index) => {
            if (outcome.status === 'fulfilled') {
                summaries.push(outcome.value);
            } else {
                this.logger.warn('Search failed', {
                    query: plan.searches[index].query,
                    error: errorMessage(outcome.reason),
                });
            }
        });
        return summaries;
    }

    public async writeReport(query: string, summaries: string[]): Promise<ReportData> {
        const task = `Original query: ${query}\nSummarized search results: ${JSON.stringify(summaries)}`;
        const result = await this.writerAgent.run(task);
        return result.finalOutput;
    }

    /** Drafts the email body for a finished report. Delivery is left to the caller. */
    public async composeEmail(report: ReportData): Promise<string> {
        const result = await this.emailAgent.run(report.markdown_report);
        return result.finalOutput;
    }

    private async search(item: WebSearchItem): Promise<string> {
        const task = `Search term: ${item.query}\nReason for searching: ${item.reason}`;
        const result = await this.searchAgent.run(task);
        return result.finalOutput;
    }
}
