import { errorMessage } from '../errors';
import type { ScrapePage } from './browser';
import type { SiteAdapter } from './types';

const BASE_URL = 'https://www.pracuj.pl';

export const PRACUJPL_SEED = 'https://it.pracuj.pl/praca/python;kw?sc=0&wm=hybrid%2Chome-office&itth=37';

const OFFER_LINK = "a[data-test='link-offer']";
const MAX_PAGE_NUMBER = "span[data-test='top-pagination-max-page-number']";
const MAX_PAGE_TIMEOUT_MS = 10000;

// Offer sections in reading order; any of them may be missing
const DESCRIPTION_SECTIONS = [
  'div[data-scroll-id="technologies-expected-1"]',
  'div[data-scroll-id="technologies-optional-1"]',
  'ul[data-test="text-about-project"]',
  'section[data-test="section-responsibilities"]',
  'section[data-test="section-requirements"]',
  'section[data-test="section-offered"]',
  'section[data-test="section-benefits"]',
];

/**
 * Resolves relative links against the site and strips query string and
 * fragment, which only carry tracking data here.
 */
export function stripTracking(href: string, base = BASE_URL): string {
  const url = new URL(href, base);
  url.search = '';
  url.hash = '';
  return url.toString();
}

/**
 * Pracuj.pl paginates its listings; every numbered page is a separate seed.
 * Re-published offers keep their slug with a new `,oferta,<id>` suffix, so
 * only the newest id per slug is kept.
 */
export class PracujPlAdapter implements SiteAdapter {
  name: string;
  seeds: string[];
  cookieAcceptLabel = 'Akceptuj wszystkie';
  dedupePolicy = 'max_id' as const;

  constructor(name = 'Pracujpl', seed = PRACUJPL_SEED) {
    this.name = name;
    this.seeds = [seed];
  }

  async maxPageNumber(page: ScrapePage): Promise<number | null> {
    const text = await page.innerText(MAX_PAGE_NUMBER, MAX_PAGE_TIMEOUT_MS);
    const value = Number.parseInt(text.trim(), 10);
    return Number.isInteger(value) && value > 0 ? value : null;
  }

  pageUrl(seed: string, pageNumber: number): string {
    const url = new URL(seed);
    url.searchParams.set('pn', String(pageNumber));
    return url.toString();
  }

  async discoverListUrls(page: ScrapePage): Promise<Set<string>> {
    const hrefs = await page.attributes(OFFER_LINK, 'href');
    const urls = new Set<string>();
    for (const href of hrefs) {
      if (!href) continue;
      try {
        urls.add(stripTracking(href));
      } catch (err) {
        console.warn(`[Pracujpl] Skipping unparsable offer link "${href}": ${errorMessage(err)}`);
      }
    }
    return urls;
  }

  async extractDescription(page: ScrapePage): Promise<string | null> {
    const parts: string[] = [];
    for (const selector of DESCRIPTION_SECTIONS) {
      const texts = await page.innerTexts(selector);
      const text = texts.join(' ').trim();
      if (text) parts.push(text);
    }
    return parts.length > 0 ? parts.join(' ') : null;
  }
}
