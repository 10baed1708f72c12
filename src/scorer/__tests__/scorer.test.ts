import { describe, it, expect, beforeEach, vi } from 'vitest';
import { JobOfferStore } from '../../db';
import { openDatabase } from '../../db/schema';
import { ScoringAuthError, ScoringRateLimitError } from '../../errors';
import type { JobOffer } from '../../scrapers/types';
import type { CompletionRequest, ScoringClient } from '../client';
import { EnrichmentOrchestrator, buildPrompt } from '../scorer';
import type { OfferSink } from '../scorer';
import type { InsertOutcome } from '../../db';

const offer = (url: string, name = 'Python Developer'): JobOffer => ({
  name,
  source: 'TestSource',
  url,
  description: 'Python, FastAPI, PostgreSQL',
  analysis: '',
  offerRating: 0,
  candidateRating: 0,
  added: new Date(),
});

const ANALYSIS = JSON.stringify({
  ocena_oferty: 70,
  dopasowanie_kandydata: 60,
  opinia: 'Solid backend role with a modern stack',
});

class StubClient implements ScoringClient {
  readonly requests: CompletionRequest[] = [];
  private respond: (request: CompletionRequest) => Promise<string>;

  constructor(respond: (request: CompletionRequest) => Promise<string>) {
    this.respond = respond;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return this.respond(request);
  }
}

// Fails every insert of one URL and delegates the rest
class FailingStore implements OfferSink {
  private inner: JobOfferStore;
  private failingUrl: string;

  constructor(inner: JobOfferStore, failingUrl: string) {
    this.inner = inner;
    this.failingUrl = failingUrl;
  }

  exists(url: string): boolean {
    return this.inner.exists(url);
  }

  insert(offer: JobOffer): InsertOutcome {
    return offer.url === this.failingUrl ? 'failed' : this.inner.insert(offer);
  }
}

const userContent = (request: CompletionRequest) => request.messages[request.messages.length - 1].content;

describe('buildPrompt', () => {
  it('leaves out empty profile and rubric messages', () => {
    const messages = buildPrompt(offer('https://jobs.test/offer/alpha'), '', '  ');

    expect(messages.map((m) => m.role)).toEqual(['system', 'system', 'system', 'user']);
    expect(messages[3].content).toBe('Full posting text for https://jobs.test/offer/alpha:\nPython, FastAPI, PostgreSQL');
  });

  it('includes profile and rubric when given', () => {
    const messages = buildPrompt(offer('https://jobs.test/offer/alpha'), 'Junior Python developer', 'Remote only');

    expect(messages).toHaveLength(6);
    expect(messages.map((m) => m.content)).toContain('Junior Python developer');
    expect(messages[4].content).toBe('Remote only');
  });
});

describe('EnrichmentOrchestrator', () => {
  let store: JobOfferStore;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    store = new JobOfferStore(openDatabase(':memory:'));
  });

  it('scores deterministically in JSON mode and keeps ratings', async () => {
    const client = new StubClient(async () => ANALYSIS);
    const enricher = new EnrichmentOrchestrator(client, store, { model: 'test-model', maxTokens: 500 });

    const scored = await enricher.scoreOffer(offer('https://jobs.test/offer/alpha'));

    expect(client.requests[0]).toMatchObject({
      model: 'test-model',
      temperature: 0,
      topP: 1,
      maxTokens: 500,
      jsonMode: true,
    });
    expect(scored).toMatchObject({ analysis: ANALYSIS, offerRating: 70, candidateRating: 60 });
  });

  it('keeps existing ratings when plain text carries no tags', async () => {
    const text = 'Ciekawa oferta, ale wymaga doświadczenia w Kubernetes i Terraform.';
    const enricher = new EnrichmentOrchestrator(new StubClient(async () => text), store);

    const scored = await enricher.scoreOffer({ ...offer('https://jobs.test/offer/alpha'), offerRating: 12 });

    expect(scored).toMatchObject({ analysis: text, offerRating: 12, candidateRating: 0 });
  });

  it('persists scored offers and isolates a failing one', async () => {
    const client = new StubClient(async (request) => {
      if (userContent(request).includes('offer/beta')) {
        throw new ScoringAuthError('Scoring service rejected credentials', 401);
      }
      return ANALYSIS;
    });
    const enricher = new EnrichmentOrchestrator(client, store, { workers: 3 });

    const summary = await enricher.enrichOffers([
      offer('https://jobs.test/offer/alpha'),
      offer('https://jobs.test/offer/beta'),
      offer('https://jobs.test/offer/gamma'),
    ]);

    expect(summary.outcomes).toEqual({ persisted: 2, duplicate: 0, rejected: 0, failed: 1 });
    expect(summary.persisted.map((o) => o.url).sort()).toEqual([
      'https://jobs.test/offer/alpha',
      'https://jobs.test/offer/gamma',
    ]);
    expect(store.count()).toBe(2);
    expect(store.exists('https://jobs.test/offer/beta')).toBe(false);
  });

  it('rejects analyses below the minimum length', async () => {
    const enricher = new EnrichmentOrchestrator(new StubClient(async () => '{"ocena_oferty": 1}'), store);

    const result = await enricher.enrichOffer(offer('https://jobs.test/offer/alpha'));

    expect(result.outcome).toBe('rejected');
    expect(store.count()).toBe(0);
  });

  it('skips stored offers without calling the model', async () => {
    store.insert({ ...offer('https://jobs.test/offer/alpha'), analysis: ANALYSIS });
    const client = new StubClient(async () => ANALYSIS);
    const enricher = new EnrichmentOrchestrator(client, store);

    const result = await enricher.enrichOffer(offer('https://jobs.test/offer/alpha'));

    expect(result.outcome).toBe('duplicate');
    expect(client.requests).toHaveLength(0);
  });

  it('lets the unique key settle the same URL scored twice in one batch', async () => {
    const enricher = new EnrichmentOrchestrator(new StubClient(async () => ANALYSIS), store, { workers: 2 });

    const summary = await enricher.enrichOffers([
      offer('https://jobs.test/offer/alpha', 'First copy'),
      offer('https://jobs.test/offer/alpha', 'Second copy'),
    ]);

    expect(summary.outcomes).toEqual({ persisted: 1, duplicate: 1, rejected: 0, failed: 0 });
    expect(store.count()).toBe(1);
  });

  it('surfaces upstream errors from enrichOffer', async () => {
    const enricher = new EnrichmentOrchestrator(
      new StubClient(async () => {
        throw new ScoringAuthError('bad key', 401);
      }),
      store
    );

    await expect(enricher.enrichOffer(offer('https://jobs.test/offer/alpha'))).rejects.toBeInstanceOf(ScoringAuthError);
  });

  it('never has more scoring calls in flight than workers', async () => {
    let inFlight = 0;
    let peak = 0;
    const client = new StubClient(async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return ANALYSIS;
    });
    const enricher = new EnrichmentOrchestrator(client, store, { workers: 2 });

    const summary = await enricher.enrichOffers(
      ['a', 'b', 'c', 'd', 'e', 'f'].map((id) => offer(`https://jobs.test/offer/${id}`))
    );

    expect(summary.outcomes.persisted).toBe(6);
    expect(client.requests).toHaveLength(6);
    expect(peak).toBe(2);
  });

  it('counts a failed insert without aborting the batch', async () => {
    const enricher = new EnrichmentOrchestrator(
      new StubClient(async () => ANALYSIS),
      new FailingStore(store, 'https://jobs.test/offer/beta'),
      { workers: 2 }
    );

    const summary = await enricher.enrichOffers([
      offer('https://jobs.test/offer/alpha'),
      offer('https://jobs.test/offer/beta'),
      offer('https://jobs.test/offer/gamma'),
    ]);

    expect(summary.outcomes).toEqual({ persisted: 2, duplicate: 0, rejected: 0, failed: 1 });
    expect(store.count()).toBe(2);
  });

  it('keeps persisting siblings of a rate-limited offer', async () => {
    const client = new StubClient(async (request) => {
      if (userContent(request).includes('offer/beta')) {
        throw new ScoringRateLimitError('Scoring service rate limit', 429);
      }
      return ANALYSIS;
    });
    const enricher = new EnrichmentOrchestrator(client, store, { workers: 1 });

    const summary = await enricher.enrichOffers([
      offer('https://jobs.test/offer/alpha'),
      offer('https://jobs.test/offer/beta'),
      offer('https://jobs.test/offer/gamma'),
    ]);

    expect(summary.outcomes).toEqual({ persisted: 2, duplicate: 0, rejected: 0, failed: 1 });
    expect(store.exists('https://jobs.test/offer/gamma')).toBe(true);
    expect(store.exists('https://jobs.test/offer/beta')).toBe(false);
  });
});
