// src/services/research/index.ts

import type { AppConfig } from '../../config';
import type { Logger } from '../base/types';
import type { InferenceClient } from '../inference/types';
import { WebSearchTool } from '../tool/WebSearchTool';
import { createEmailAgent, createSearchAgent, createWriterAgent } from './agents';
import { ResearchManager } from './ResearchManager';
import { ResearchPlanner } from './ResearchPlanner';

export function createResearchPlanner(config: AppConfig, inference: InferenceClient, logger: Logger): ResearchPlanner {
    return new ResearchPlanner({ logger, inference, model: config.RESEARCH_MODEL });
}

export function createResearchManager(config: AppConfig, inference: InferenceClient, logger: Logger): ResearchManager {
    const deps = { logger, inference, model: config.RESEARCH_MODEL };
    const searchTool = new WebSearchTool({
        logger,
        apiKey: config.SERPAPI_API_KEY,
        maxResults: config.SEARCH_RESULTS,
    });

    return new ResearchManager({
        logger,
        planner: createResearchPlanner(config, inference, logger),
        searchAgent: createSearchAgent({ ...deps, searchTool }),
        writerAgent: createWriterAgent(deps),
        emailAgent: createEmailAgent(deps),
    });
}

export { ResearchPlanner, type WebSearchPlan, type WebSearchItem } from './ResearchPlanner';
export { ResearchManager } from './ResearchManager';
