// src/services/research/ResearchPlanner.ts

import { z } from 'zod';
import type { ServiceConfig } from '../base/types';
import type { InferenceClient } from '../inference/types';
import { Agent } from './Agent';
import { jsonOutput } from './output';
import { PLANNER_INSTRUCTIONS, WEB_SEARCH_PLAN_SCHEMA_DESCRIPTION } from './prompts/plannerPrompt';

export const MIN_SEARCHES = 3;
export const MAX_SEARCHES = 6;
export const MAX_QUERY_LENGTH = 100;

export const webSearchItemSchema = z
    .object({
        query: z.string().trim().min(1).max(MAX_QUERY_LENGTH),
        reason: z.string().trim().min(1),
    })
    .strict();

export const webSearchPlanSchema = z
    .object({
        searches: z.array(webSearchItemSchema).min(MIN_SEARCHES).max(MAX_SEARCHES),
    })
    .strict()
    .superRefine((plan, ctx) => {
        const seen = new Set<string>();
        plan.searches.forEach((item, index) => {
            if (seen.has(item.query)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `Duplicate search query "${item.query}"`,
                    path: ['searches', index, 'query'],
                });
            }
            seen.add(item.query);
        });
    });

export type WebSearchItem = z.infer<typeof webSearchItemSchema>;
export type WebSearchPlan = z.infer<typeof webSearchPlanSchema>;

export interface ResearchPlannerConfig extends ServiceConfig {
    inference: InferenceClient;
    model?: string;
}

/** Decomposes a research question into a validated set of web searches. */
export class ResearchPlanner {
    private agent: Agent<WebSearchPlan>;

    constructor(config: ResearchPlannerConfig) {
        this.agent = new Agent({
            logger: config.logger,
            name: 'Planner Agent',
            instructions: PLANNER_INSTRUCTIONS,
            inference: config.inference,
            model: config.model,
            output: jsonOutput('WebSearchPlan', WEB_SEARCH_PLAN_SCHEMA_DESCRIPTION, webSearchPlanSchema),
            settings: { temperature: 0.3, topP: 0.9 },
        });
    }

    /** @throws SchemaValidationError when the model's plan does not validate */
    public async plan(userQuery: string): Promise<WebSearchPlan> {
        const result = await this.agent.run(`Query: ${userQuery}`);
        return result.finalOutput;
    }
}
