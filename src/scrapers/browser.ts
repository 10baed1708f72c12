export interface ScrapeBrowser {
  newContext(): Promise<ScrapeContext>;
  close(): Promise<void>;
}

export interface ScrapeContext {
  newPage(): Promise<ScrapePage>;
  close(): Promise<void>;
}

/**
 * The subset of page automation the adapters and the extractor need.
 * Waiting operations throw TransientFetchError when they run out of time.
 */
export interface ScrapePage {
  goto(url: string, timeoutMs: number): Promise<void>;
  reload(timeoutMs: number): Promise<void>;
  waitForTimeout(ms: number): Promise<void>;
  title(): Promise<string>;
  clickButton(label: string, timeoutMs: number): Promise<void>;
  /** Attribute value of every element matching the selector, without waiting. */
  attributes(selector: string, name: string): Promise<Array<string | null>>;
  /** Inner text of the first match, waiting up to timeoutMs for it to appear. */
  innerText(selector: string, timeoutMs: number): Promise<string>;
  /** Inner text of every element matching the selector, without waiting. */
  innerTexts(selector: string): Promise<string[]>;
  isVisible(selector: string, timeoutMs: number): Promise<boolean>;
  scrollY(): Promise<number>;
  scrollTo(y: number): Promise<void>;
  close(): Promise<void>;
}

/** Runs fn inside a fresh browsing context that is closed on every exit path. */
export async function withContext<T>(
  browser: ScrapeBrowser,
  fn: (context: ScrapeContext) => Promise<T>
): Promise<T> {
  const context = await browser.newContext();
  try {
    return await fn(context);
  } finally {
    await context.close().catch((err: unknown) => {
      console.error('[Browser] Failed to close context:', err);
    });
  }
}

/** Same as withContext for a single page. */
export async function withPage<T>(
  context: ScrapeContext,
  fn: (page: ScrapePage) => Promise<T>
): Promise<T> {
  const page = await context.newPage();
  try {
    return await fn(page);
  } finally {
    await page.close().catch((err: unknown) => {
      console.error('[Browser] Failed to close page:', err);
    });
  }
}

export interface ScrollCollectOptions {
  step?: number;
  pauseMs?: number;
  maxRounds?: number;
}

/**
 * Scrolls a virtualized list step by step and collects an attribute of the
 * matching elements at every position, until the viewport stops moving.
 */
export async function scrollAndCollect(
  page: ScrapePage,
  selector: string,
  attribute: string,
  options: ScrollCollectOptions = {}
): Promise<Set<string>> {
  const step = options.step ?? 400;
  const pauseMs = options.pauseMs ?? 250;
  const maxRounds = options.maxRounds ?? 500;
  const collected = new Set<string>();

  for (let round = 0; round < maxRounds; round++) {
    for (const value of await page.attributes(selector, attribute)) {
      if (value) collected.add(value);
    }

    const before = await page.scrollY();
    await page.scrollTo(before + step);
    await page.waitForTimeout(pauseMs);
    const after = await page.scrollY();
    if (after <= before) break;
  }

  return collected;
}
