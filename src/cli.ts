#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

import readline from 'readline/promises';
import { loadConfig } from './config';
import type { AppConfig } from './config';
import { JobOfferStore } from './db';
import { writeReport } from './report/html';
import { OpenAiScoringClient } from './scorer/client';
import { EnrichmentOrchestrator } from './scorer/scorer';
import { launchBrowser } from './scrapers/playwright';
import { adapters, runPipeline } from './scrapers/runner';
import { dayRange, parseDay } from './utils/dates';

const [command, arg] = process.argv.slice(2);

async function confirmOnTerminal(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return answer.trim().toLowerCase() === 'y';
  } finally {
    rl.close();
  }
}

async function run(config: AppConfig, store: JobOfferStore, source: string): Promise<void> {
  if (source !== 'all' && !adapters[source]) {
    throw new Error(`Unknown source: ${source}. Available: ${Object.keys(adapters).join(', ')}`);
  }
  if (!config.scoring.apiKey) {
    throw new Error('SCORING_API_KEY not set');
  }

  const client = new OpenAiScoringClient(config.scoring.apiKey, config.scoring.baseUrl);
  const enricher = new EnrichmentOrchestrator(client, store, {
    workers: config.enrichmentWorkers,
    model: config.scoring.model,
    maxTokens: config.scoring.maxTokens,
    candidateProfile: config.candidateProfile,
    scoringRubric: config.scoringRubric,
    minAnalysisLength: config.minAnalysisLength,
  });

  console.log('[CLI] Launching browser...');
  const browser = await launchBrowser({ headless: config.headless, executablePath: config.chromiumPath });
  try {
    const results = await runPipeline(
      {
        browser,
        store,
        enricher,
        extraction: { workers: config.extractionWorkers },
        maxBotBlocks: config.maxBotBlocks,
      },
      source === 'all' ? undefined : [source]
    );
    console.log('\nResults:', JSON.stringify(results, null, 2));
  } finally {
    await browser.close();
    console.log('[CLI] Browser closed.');
  }
}

function report(config: AppConfig, store: JobOfferStore, day: string | undefined): void {
  const date = day ? parseDay(day) : new Date();
  if (!date) {
    throw new Error(`Invalid date "${day}", expected YYYY-MM-DD`);
  }
  const { start, end } = dayRange(date);
  const offers = store.selectByDateRange(start, end);
  if (offers.length === 0) {
    console.warn(`[CLI] No offers found for ${start.toISOString().slice(0, 10)}`);
    return;
  }
  const file = writeReport(offers, config.reportDir);
  console.log(`\nReport written to ${file}`);
}

async function main() {
  const config = loadConfig();

  switch (command) {
    case 'sources': {
      console.log(Object.keys(adapters).join('\n'));
      return;
    }
    case 'run':
    case 'report':
    case 'stats':
    case 'wipe':
      break;
    default:
      console.log(`
Usage:
  tsx src/cli.ts run [source]        Scrape, score and store offers (any listed source, or all)
  tsx src/cli.ts report [YYYY-MM-DD] Write an HTML report of one day's offers (default: today)
  tsx src/cli.ts stats               Show store statistics
  tsx src/cli.ts sources             List sources
  tsx src/cli.ts wipe                Delete all stored offers (asks for confirmation)
      `);
      return;
  }

  const store = JobOfferStore.open(config.databasePath, config.tableName);
  try {
    switch (command) {
      case 'run':
        await run(config, store, arg || 'all');
        break;
      case 'report':
        report(config, store, arg);
        break;
      case 'stats':
        console.log('\nStats:', JSON.stringify(store.stats(), null, 2));
        break;
      case 'wipe':
        await store.dropAll(() =>
          confirmOnTerminal(`Confirm deletion of the ${config.tableName} table by typing 'y'... `)
        );
        break;
    }
  } finally {
    store.close();
  }
}

main().catch(err => {
  console.error('Error:', err);
  process.exit(1);
});
