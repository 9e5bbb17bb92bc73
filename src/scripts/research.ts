#!/usr/bin/env node
// src/scripts/research.ts
// Runs a full research pass from the terminal and prints progress as it arrives.

/*
Usage:

  npm run research -- "Impact of remote work on urban housing"
  npm run research -- --plan-only "Quantum error correction"

*/

import { initialiseEnv, loadConfig } from '../config';
import logger from '../utils/logger';
import { createInferenceClient } from '../services/inference';
import { createResearchManager, createResearchPlanner } from '../services/research';
import { errorMessage } from '../errors';

export interface ResearchArgs {
  query: string;
  planOnly: boolean;
}

export function parseArgs(argv: string[]): ResearchArgs {
  const args: ResearchArgs = { query: '', planOnly: false };
  const rest: string[] = [];

  for (const a of argv) {
    if (a === '--plan-only') args.planOnly = true;
    else rest.push(a);
  }

  args.query = rest.join(' ').trim();
  return args;
}

async function main(): Promise<void> {
  const { query, planOnly } = parseArgs(process.argv.slice(2));
  if (!query) {
    console.error('Usage: npm run research -- [--plan-only] "<query>"');
    process.exit(1);
  }

  initialiseEnv();
  const config = loadConfig();
  const inference = createInferenceClient(config, logger);

  if (planOnly) {
    const plan = await createResearchPlanner(config, inference, logger).plan(query);
    console.log(JSON.stringify(plan, null, 2));
    return;
  }

  const manager = createResearchManager(config, inference, logger);
  for await (const chunk of manager.run(query)) {
    console.log(chunk);
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`Research failed: ${errorMessage(error)}`);
    process.exit(1);
  });
}
