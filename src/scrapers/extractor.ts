import pLimit from 'p-limit';
import {
  BotBlockedError,
  FetchCancelledError,
  TransientFetchError,
  errorMessage,
} from '../errors';
import { withContext, withPage } from './browser';
import type { ScrapeBrowser, ScrapeContext, ScrapePage } from './browser';
import { dedupe } from './canonical';
import { FORBIDDEN_TITLE_PHRASES, isBotBlockedTitle, simplifyText } from './filters';
import type { JobOffer, OfferLookup, SiteAdapter } from './types';

export interface ExtractionOptions {
  /** Pages that may be open at once within one adapter run. */
  workers: number;
  navigationTimeoutMs: number;
  reloadTimeoutMs: number;
  settleMs: number;
  cookieTimeoutMs: number;
  retryAttempts: number;
  forbiddenTitlePhrases: readonly string[];
}

export const DEFAULT_EXTRACTION_OPTIONS: ExtractionOptions = {
  workers: 15,
  navigationTimeoutMs: 120_000,
  reloadTimeoutMs: 60_000,
  settleMs: 1000,
  cookieTimeoutMs: 3000,
  retryAttempts: 3,
  forbiddenTitlePhrases: FORBIDDEN_TITLE_PHRASES,
};

type Limit = ReturnType<typeof pLimit>;

/**
 * Runs one site adapter end to end: discovery, store filtering, concurrent
 * detail fetches and assembly of JobOffer records.
 *
 * Every run uses its own browsing context. A bot-blocked page aborts the
 * whole batch and the BotBlockedError is rethrown once all sibling fetches
 * have wound down; any other failure only drops the affected URL.
 */
export class ExtractionOrchestrator {
  private adapter: SiteAdapter;
  private browser: ScrapeBrowser;
  private store: OfferLookup;
  private options: ExtractionOptions;
  private tag: string;

  constructor(
    adapter: SiteAdapter,
    browser: ScrapeBrowser,
    store: OfferLookup,
    options: Partial<ExtractionOptions> = {}
  ) {
    this.adapter = adapter;
    this.browser = browser;
    this.store = store;
    this.options = { ...DEFAULT_EXTRACTION_OPTIONS, ...options };
    this.tag = `[Extractor:${adapter.name}]`;
  }

  async performFullExtraction(): Promise<JobOffer[]> {
    return withContext(this.browser, async (context) => {
      const limit = pLimit(this.options.workers);

      const discovered = await this.discover(context, limit);
      const unseen = this.filterUnseen([...discovered]);
      if (unseen.length === 0) {
        console.warn(`${this.tag} No new URLs to fetch`);
        return [];
      }

      const urls = this.adapter.dedupePolicy ? dedupe(unseen, this.adapter.dedupePolicy) : unseen;
      return this.fetchAll(context, limit, urls);
    });
  }

  /** Union of posting URLs found on every seed (and every page of paginated seeds). */
  async discover(context: ScrapeContext, limit: Limit): Promise<Set<string>> {
    const seeds = await this.expandSeeds(context);
    const found = new Set<string>();

    await Promise.all(
      seeds.map((seed) =>
        limit(async () => {
          try {
            const urls = await withPage(context, async (page) => {
              await page.goto(seed, this.options.navigationTimeoutMs);
              await this.dismissCookies(page);
              return this.adapter.discoverListUrls(page, seed);
            });
            console.log(`${this.tag} ${urls.size} posting URLs on ${seed}`);
            for (const url of urls) found.add(url);
          } catch (err) {
            console.error(`${this.tag} Discovery failed on ${seed}: ${errorMessage(err)}`);
          }
        })
      )
    );

    console.log(`${this.tag} Discovered ${found.size} unique posting URLs`);
    return found;
  }

  private async expandSeeds(context: ScrapeContext): Promise<string[]> {
    const { maxPageNumber, pageUrl } = this.adapter;
    if (!maxPageNumber || !pageUrl) return this.adapter.seeds;

    const expanded: string[] = [];
    for (const seed of this.adapter.seeds) {
      let lastPage: number | null = null;
      try {
        lastPage = await withPage(context, async (page) => {
          await page.goto(seed, this.options.navigationTimeoutMs);
          await this.dismissCookies(page);
          return maxPageNumber.call(this.adapter, page);
        });
      } catch (err) {
        console.warn(`${this.tag} Could not read page count on ${seed}: ${errorMessage(err)}`);
      }

      if (lastPage === null) {
        expanded.push(seed);
        continue;
      }
      for (let n = 1; n <= lastPage; n++) {
        expanded.push(pageUrl.call(this.adapter, seed, n));
      }
    }
    return expanded;
  }

  private async dismissCookies(page: ScrapePage): Promise<void> {
    const label = this.adapter.cookieAcceptLabel;
    if (!label) return;
    try {
      await page.clickButton(label, this.options.cookieTimeoutMs);
      await page.waitForTimeout(this.options.settleMs);
    } catch (err) {
      console.log(`${this.tag} No cookie banner dismissed: ${errorMessage(err)}`);
    }
  }

  /** Drops URLs already in the store. Racing producers are settled by the store's unique key. */
  filterUnseen(urls: string[]): string[] {
    const unseen = urls.filter((url) => !this.store.exists(url));
    const skipped = urls.length - unseen.length;
    if (skipped > 0) {
      console.log(`${this.tag} Skipping ${skipped} already stored URLs`);
    }
    return unseen;
  }

  /**
   * Fetches all URLs under the admission gate. Resolves with the offers that
   * could be assembled, or rejects with the BotBlockedError that aborted the batch.
   */
  async fetchAll(context: ScrapeContext, limit: Limit, urls: string[]): Promise<JobOffer[]> {
    const controller = new AbortController();

    const results = await Promise.allSettled(
      urls.map((url) =>
        limit(async () => {
          try {
            return await this.fetchOffer(context, url, controller.signal);
          } catch (err) {
            if (err instanceof BotBlockedError && !controller.signal.aborted) {
              console.error(`${this.tag} ${err.message}; cancelling the batch`);
              controller.abort(err);
            }
            throw err;
          }
        })
      )
    );

    if (controller.signal.aborted) {
      const cancelled = results.filter(
        (r) => r.status === 'rejected' && r.reason instanceof FetchCancelledError
      ).length;
      console.warn(`${this.tag} Batch aborted, ${cancelled} fetches cancelled`);
      const reason: unknown = controller.signal.reason;
      if (reason instanceof BotBlockedError) throw reason;
    }

    const offers: JobOffer[] = [];
    for (const [i, result] of results.entries()) {
      if (result.status === 'fulfilled') {
        if (result.value) offers.push(result.value);
      } else {
        console.error(`${this.tag} Failed to process ${urls[i]}: ${errorMessage(result.reason)}`);
      }
    }

    console.log(`${this.tag} Finished details. Ok: ${offers.length}, Fail: ${urls.length - offers.length}`);
    return offers;
  }

  private async fetchOffer(
    context: ScrapeContext,
    url: string,
    signal: AbortSignal
  ): Promise<JobOffer | null> {
    if (signal.aborted) throw new FetchCancelledError(url);

    const page = await context.newPage();
    // Closing the page makes whatever it is waiting on reject promptly
    const onAbort = () => {
      page.close().catch((err: unknown) => {
        console.error(`${this.tag} Failed to close cancelled page ${url}: ${errorMessage(err)}`);
      });
    };
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      // The batch may have been aborted while the page was opening
      if (signal.aborted) throw new FetchCancelledError(url);
      console.log(`${this.tag} Scraping ${url}`);
      await page.goto(url, this.options.navigationTimeoutMs);
      await page.waitForTimeout(this.options.settleMs);

      const title = await page.title();
      if (isBotBlockedTitle(title, this.options.forbiddenTitlePhrases)) {
        throw new BotBlockedError(url, title);
      }

      const description = await this.extractWithRetry(page, url, signal);
      if (description === null) {
        console.warn(`${this.tag} No job description found for ${url}`);
        return null;
      }

      console.log(`${this.tag} Scraped "${title}"`);
      return {
        name: title,
        source: this.adapter.name,
        url,
        description: simplifyText(description),
        analysis: '',
        offerRating: 0,
        candidateRating: 0,
        added: new Date(),
      };
    } catch (err) {
      if (signal.aborted && !(err instanceof BotBlockedError)) {
        throw new FetchCancelledError(url, { cause: err });
      }
      throw err;
    } finally {
      signal.removeEventListener('abort', onAbort);
      await page.close().catch((err: unknown) => {
        console.error(`${this.tag} Failed to close page ${url}: ${errorMessage(err)}`);
      });
    }
  }

  /**
   * Up to `retryAttempts` extraction attempts. Timeouts reload the page and
   * try again; a clean miss is final.
   */
  private async extractWithRetry(
    page: ScrapePage,
    url: string,
    signal: AbortSignal
  ): Promise<string | null> {
    const attempts = this.options.retryAttempts;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (signal.aborted) throw new FetchCancelledError(url);

      try {
        const text = await this.adapter.extractDescription(page);
        return text !== null && text.trim() !== '' ? text : null;
      } catch (err) {
        if (!(err instanceof TransientFetchError)) throw err;
        console.log(`${this.tag} Description timed out on ${url} (${attempt}/${attempts})`);
      }

      if (attempt < attempts) {
        try {
          await page.reload(this.options.reloadTimeoutMs);
          await page.waitForTimeout(this.options.settleMs);
        } catch (err) {
          if (!(err instanceof TransientFetchError)) throw err;
          console.log(`${this.tag} Reload timed out on ${url}: ${err.message}`);
        }
      }
    }

    return null;
  }
}
