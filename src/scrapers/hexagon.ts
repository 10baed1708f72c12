import type { ScrapePage } from './browser';
import type { SiteAdapter } from './types';

const BASE_URL = 'https://hexagon.com';
export const HEXAGON_SEED = 'https://hexagon.com/company/careers/job-listings#jl_country=Poland&jl_e=0';

const JOB_LINK = 'div.job-url a';
const VISIBLE_TIMEOUT_MS = 5000;

// Postings are hosted on a few different ATS front ends
const DESCRIPTION_CONTAINERS = ['span[itemprop=description]', 'div[data-reach-tab-panels]'];
const QUESTION_BLOCKS = "div.ng-scope[ng-repeat*='JobDetailQuestions']";

export function normalizeHexagonLink(href: string): string {
  const link = href.replace('/c/new', '');
  return new URL(link, BASE_URL).toString();
}

export class HexagonAdapter implements SiteAdapter {
  name = 'Hexagon';
  seeds: string[];
  cookieAcceptLabel = 'Accept all';

  constructor(seed = HEXAGON_SEED) {
    this.seeds = [seed];
  }

  async discoverListUrls(page: ScrapePage): Promise<Set<string>> {
    const hrefs = await page.attributes(JOB_LINK, 'href');
    console.log(`[Hexagon] Found ${hrefs.length} job elements`);

    const urls = new Set<string>();
    for (const href of hrefs) {
      if (!href) {
        console.warn('[Hexagon] Job element without href, skipping');
        continue;
      }
      urls.add(normalizeHexagonLink(href));
    }
    return urls;
  }

  async extractDescription(page: ScrapePage): Promise<string | null> {
    for (const selector of DESCRIPTION_CONTAINERS) {
      if (await page.isVisible(selector, VISIBLE_TIMEOUT_MS)) {
        return page.innerText(selector, VISIBLE_TIMEOUT_MS);
      }
    }

    const questions = await page.innerTexts(QUESTION_BLOCKS);
    if (questions.length > 0) return questions.join(' ');

    return null;
  }
}
