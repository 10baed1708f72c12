import { chromium, errors } from 'playwright-core';
import type { Browser, BrowserContext, Page } from 'playwright-core';
import { TransientFetchError } from '../errors';
import type { ScrapeBrowser, ScrapeContext, ScrapePage } from './browser';

const USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/128.0.0.0 Safari/537.36';

export interface PlaywrightOptions {
  headless: boolean;
  executablePath?: string;
}

export async function launchBrowser(options: PlaywrightOptions): Promise<ScrapeBrowser> {
  const executablePath = options.executablePath && options.executablePath.length > 0
    ? options.executablePath
    : undefined;
  const browser = await chromium.launch({
    headless: options.headless,
    executablePath,
  });
  return new PlaywrightBrowser(browser);
}

async function translateTimeout<T>(what: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (err) {
    if (err instanceof errors.TimeoutError) {
      throw new TransientFetchError(`Timed out: ${what}`, { cause: err });
    }
    throw err;
  }
}

class PlaywrightBrowser implements ScrapeBrowser {
  private browser: Browser;

  constructor(browser: Browser) {
    this.browser = browser;
  }

  async newContext(): Promise<ScrapeContext> {
    const context = await this.browser.newContext({ userAgent: USER_AGENT });
    return new PlaywrightContext(context);
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

class PlaywrightContext implements ScrapeContext {
  private context: BrowserContext;

  constructor(context: BrowserContext) {
    this.context = context;
  }

  async newPage(): Promise<ScrapePage> {
    const page = await this.context.newPage();
    return new PlaywrightPage(page);
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

class PlaywrightPage implements ScrapePage {
  private page: Page;

  constructor(page: Page) {
    this.page = page;
  }

  async goto(url: string, timeoutMs: number): Promise<void> {
    await translateTimeout(`navigation to ${url}`, () =>
      this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs })
    );
  }

  async reload(timeoutMs: number): Promise<void> {
    await translateTimeout(`reload of ${this.page.url()}`, () =>
      this.page.reload({ waitUntil: 'domcontentloaded', timeout: timeoutMs })
    );
  }

  async waitForTimeout(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async title(): Promise<string> {
    return this.page.title();
  }

  async clickButton(label: string, timeoutMs: number): Promise<void> {
    await translateTimeout(`button "${label}"`, () =>
      this.page.getByRole('button', { name: label }).click({ timeout: timeoutMs })
    );
  }

  async attributes(selector: string, name: string): Promise<Array<string | null>> {
    const locators = await this.page.locator(selector).all();
    return Promise.all(locators.map((locator) => locator.getAttribute(name)));
  }

  async innerText(selector: string, timeoutMs: number): Promise<string> {
    return translateTimeout(`text of ${selector}`, () =>
      this.page.locator(selector).first().innerText({ timeout: timeoutMs })
    );
  }

  async innerTexts(selector: string): Promise<string[]> {
    return this.page.locator(selector).allInnerTexts();
  }

  async isVisible(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.locator(selector).first().waitFor({ state: 'visible', timeout: timeoutMs });
      return true;
    } catch (err) {
      if (err instanceof errors.TimeoutError) return false;
      throw err;
    }
  }

  async scrollY(): Promise<number> {
    return this.page.evaluate<number>('window.scrollY');
  }

  async scrollTo(y: number): Promise<void> {
    await this.page.evaluate(`window.scrollTo(0, ${Math.max(0, Math.floor(y))})`);
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}
