import type { JobOfferStore } from '../db';
import { BotBlockedError, errorMessage } from '../errors';
import type { EnrichmentOrchestrator, EnrichmentSummary } from '../scorer/scorer';
import type { ScrapeBrowser } from './browser';
import { ExtractionOrchestrator } from './extractor';
import type { ExtractionOptions } from './extractor';
import { HexagonAdapter } from './hexagon';
import { JUSTJOINIT_CATEGORIES, JustJoinItAdapter } from './justjoinit';
import { PracujPlAdapter } from './pracujpl';
import type { SiteAdapter } from './types';

export type AdapterFactory = () => SiteAdapter;

export const adapters: Record<string, AdapterFactory> = {
  ...Object.fromEntries(
    Object.entries(JUSTJOINIT_CATEGORIES).map(([category, seed]): [string, AdapterFactory] => {
      const name = `JustJoinIt-${category}`;
      return [name, () => new JustJoinItAdapter(name, seed)];
    })
  ),
  Pracujpl: () => new PracujPlAdapter(),
  Hexagon: () => new HexagonAdapter(),
};

export interface PipelineDeps {
  browser: ScrapeBrowser;
  store: JobOfferStore;
  enricher: EnrichmentOrchestrator;
  extraction?: Partial<ExtractionOptions>;
  /** Sources run after this many bot-blocked ones are skipped. */
  maxBotBlocks?: number;
  adapters?: Record<string, AdapterFactory>;
}

export interface SourceRunResult {
  status: 'completed' | 'blocked' | 'failed' | 'skipped';
  offersFound: number;
  offersNew: number;
  error?: string;
}

export async function runSource(source: string, deps: PipelineDeps): Promise<SourceRunResult> {
  const registry = deps.adapters ?? adapters;
  const factory = registry[source];
  if (!factory) {
    throw new Error(`Unknown source: ${source}. Available: ${Object.keys(registry).join(', ')}`);
  }

  const adapter = factory();
  const runId = deps.store.startScrapeRun(source);

  try {
    console.log(`[Runner] Starting extraction for ${source}...`);
    const extractor = new ExtractionOrchestrator(adapter, deps.browser, deps.store, deps.extraction);
    const offers = await extractor.performFullExtraction();

    let summary: EnrichmentSummary | null = null;
    if (offers.length > 0) {
      summary = await deps.enricher.enrichOffers(offers);
    }
    const offersNew = summary?.outcomes.persisted ?? 0;

    deps.store.completeScrapeRun(runId, 'completed', offers.length, offersNew);
    console.log(`[Runner] ${source} complete: ${offers.length} extracted, ${offersNew} stored`);
    return { status: 'completed', offersFound: offers.length, offersNew };
  } catch (error) {
    const message = errorMessage(error);
    const status = error instanceof BotBlockedError ? 'blocked' : 'failed';
    deps.store.completeScrapeRun(runId, status, 0, 0, message);
    console.error(`[Runner] ${source} ${status}: ${message}`);
    return { status, offersFound: 0, offersNew: 0, error: message };
  }
}

/**
 * Runs the given sources one after another, each isolated from the others'
 * failures. Stops starting new sources once `maxBotBlocks` were blocked.
 */
export async function runPipeline(
  deps: PipelineDeps,
  sources: string[] = Object.keys(deps.adapters ?? adapters)
): Promise<Record<string, SourceRunResult>> {
  const maxBotBlocks = deps.maxBotBlocks ?? 2;
  const results: Record<string, SourceRunResult> = {};
  let blocked = 0;

  for (const source of sources) {
    if (blocked >= maxBotBlocks) {
      console.warn(`[Runner] Skipping ${source}: ${blocked} sources were bot-blocked this run`);
      results[source] = { status: 'skipped', offersFound: 0, offersNew: 0 };
      continue;
    }

    results[source] = await runSource(source, deps);
    if (results[source].status === 'blocked') blocked++;
  }

  return results;
}
