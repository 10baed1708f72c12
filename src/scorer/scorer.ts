import pLimit from 'p-limit';
import type { InsertOutcome } from '../db';
import { MalformedResponseError, errorMessage } from '../errors';
import type { JobOffer, OfferLookup } from '../scrapers/types';
import type { ChatMessage, ScoringClient } from './client';
import { OUTPUT_FORMAT_PROMPT, PERSONA_PROMPT, buildNormalizationPrompt } from './profile';
import { analysisText, cleanModelResponse, extractRatings } from './response';

export interface EnrichmentOptions {
  workers: number;
  model: string;
  maxTokens: number;
  candidateProfile: string;
  scoringRubric: string;
  /** Analyses shorter than this are treated as noise and not stored. */
  minAnalysisLength: number;
}

export const DEFAULT_ENRICHMENT_OPTIONS: EnrichmentOptions = {
  workers: 10,
  model: 'deepseek-reasoner',
  maxTokens: 10000,
  candidateProfile: '',
  scoringRubric: '',
  minAnalysisLength: 40,
};

export type EnrichmentOutcome = 'persisted' | 'duplicate' | 'rejected' | 'failed';

export interface EnrichmentSummary {
  persisted: JobOffer[];
  outcomes: Record<EnrichmentOutcome, number>;
}

/** The store as seen by enrichment: existence checks and inserts. */
export interface OfferSink extends OfferLookup {
  insert(offer: JobOffer): InsertOutcome;
}

export function buildPrompt(
  offer: JobOffer,
  candidateProfile: string,
  scoringRubric: string
): ChatMessage[] {
  const system = [
    PERSONA_PROMPT,
    OUTPUT_FORMAT_PROMPT,
    candidateProfile,
    buildNormalizationPrompt(),
    scoringRubric,
  ].filter((content) => content.trim().length > 0);

  return [
    ...system.map((content): ChatMessage => ({ role: 'system', content })),
    { role: 'user', content: `Full posting text for ${offer.url}:\n${offer.description}` },
  ];
}

/**
 * Scores offers with the language model and stores them.
 *
 * A fixed pool of workers drains the input; inserts go through a single
 * write lock. Every offer ends persisted, skipped as a duplicate, rejected
 * as noise, or failed, and each outcome is logged.
 */
export class EnrichmentOrchestrator {
  private client: ScoringClient;
  private store: OfferSink;
  private options: EnrichmentOptions;
  private writeLock = pLimit(1);

  constructor(client: ScoringClient, store: OfferSink, options: Partial<EnrichmentOptions> = {}) {
    this.client = client;
    this.store = store;
    this.options = { ...DEFAULT_ENRICHMENT_OPTIONS, ...options };
  }

  /**
   * Returns a scored copy of the offer. Throws MalformedResponseError for
   * noise and lets UpstreamServiceError through.
   */
  async scoreOffer(offer: JobOffer): Promise<JobOffer> {
    const raw = await this.client.complete({
      messages: buildPrompt(offer, this.options.candidateProfile, this.options.scoringRubric),
      model: this.options.model,
      temperature: 0,
      topP: 1,
      maxTokens: this.options.maxTokens,
      jsonMode: true,
    });
    console.log(`[Scorer] Response for ${offer.url}`);

    const response = cleanModelResponse(raw);
    const analysis = analysisText(response);
    if (analysis.length < this.options.minAnalysisLength) {
      throw new MalformedResponseError(
        `Analysis for ${offer.url} too short (${analysis.length} chars): ${JSON.stringify(analysis)}`
      );
    }

    const { offerRating, candidateRating } = extractRatings(response);
    return {
      ...offer,
      analysis,
      offerRating: offerRating ?? offer.offerRating,
      candidateRating: candidateRating ?? offer.candidateRating,
    };
  }

  /** Scores and stores one offer. UpstreamServiceError propagates to the caller. */
  async enrichOffer(offer: JobOffer): Promise<{ outcome: EnrichmentOutcome; offer: JobOffer }> {
    if (this.store.exists(offer.url)) {
      console.warn(`[Scorer] Offer already stored, skipping: ${offer.name}`);
      return { outcome: 'duplicate', offer };
    }

    console.log(`[Scorer] Processing: ${offer.name}`);
    let scored: JobOffer;
    try {
      scored = await this.scoreOffer(offer);
    } catch (err) {
      if (err instanceof MalformedResponseError) {
        console.warn(`[Scorer] Rejected: ${err.message}`);
        return { outcome: 'rejected', offer };
      }
      throw err;
    }

    const inserted = await this.writeLock(() => this.store.insert(scored));
    switch (inserted) {
      case 'inserted':
        return { outcome: 'persisted', offer: scored };
      case 'duplicate':
        return { outcome: 'duplicate', offer: scored };
      case 'failed':
        return { outcome: 'failed', offer: scored };
    }
  }

  async enrichOffers(offers: JobOffer[]): Promise<EnrichmentSummary> {
    const limit = pLimit(this.options.workers);
    const summary: EnrichmentSummary = {
      persisted: [],
      outcomes: { persisted: 0, duplicate: 0, rejected: 0, failed: 0 },
    };

    console.log(`[Scorer] Scoring ${offers.length} offers with ${this.options.workers} workers...`);

    await Promise.all(
      offers.map((offer) =>
        limit(async () => {
          try {
            const result = await this.enrichOffer(offer);
            summary.outcomes[result.outcome]++;
            if (result.outcome === 'persisted') summary.persisted.push(result.offer);
          } catch (err) {
            summary.outcomes.failed++;
            console.error(`[Scorer] Failed to score "${offer.name}" (${offer.url}): ${errorMessage(err)}`);
          }
        })
      )
    );

    const { persisted, duplicate, rejected, failed } = summary.outcomes;
    console.log(
      `[Scorer] Done. Persisted ${persisted}/${offers.length} (duplicates: ${duplicate}, rejected: ${rejected}, failed: ${failed})`
    );
    return summary;
  }
}
