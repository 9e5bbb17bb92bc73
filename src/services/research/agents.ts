// src/services/research/agents.ts

import { z } from 'zod';
import type { Logger } from '../base/types';
import type { InferenceClient } from '../inference/types';
import type { SearchTool } from '../tool/types';
import { Agent } from './Agent';
import { jsonOutput, textOutput } from './output';
import { SEARCH_INSTRUCTIONS } from './prompts/searchPrompt';
import { REPORT_SCHEMA_DESCRIPTION, WRITER_INSTRUCTIONS } from './prompts/writerPrompt';
import { EMAIL_INSTRUCTIONS } from './prompts/emailPrompt';

export const reportDataSchema = z.object({
    short_summary: z.string().min(1),
    markdown_report: z.string().min(1),
    follow_up_questions: z.array(z.string()),
});

export type ReportData = z.infer<typeof reportDataSchema>;

interface AgentDeps {
    logger: Logger;
    inference: InferenceClient;
    model?: string;
}

export function createSearchAgent(deps: AgentDeps & { searchTool: SearchTool }): Agent<string> {
    return new Agent({
        ...deps,
        name: 'Search Agent',
        instructions: SEARCH_INSTRUCTIONS,
        output: textOutput,
    });
}

export function createWriterAgent(deps: AgentDeps): Agent<ReportData> {
    return new Agent({
        ...deps,
        name: 'Writer Agent',
        instructions: WRITER_INSTRUCTIONS,
        output: jsonOutput('ReportData', REPORT_SCHEMA_DESCRIPTION, reportDataSchema),
    });
}

export function createEmailAgent(deps: AgentDeps): Agent<string> {
    return new Agent({
        ...deps,
        name: 'Email Agent',
        instructions: EMAIL_INSTRUCTIONS,
        output: textOutput,
        settings: { temperature: 0.5 },
    });
}
