import { scrollAndCollect } from './browser';
import type { ScrapePage } from './browser';
import type { SiteAdapter } from './types';

const BASE_URL = 'https://justjoin.it';
const OFFER_CARD = 'a.offer-card';
const CONTENT_TIMEOUT_MS = 10000;

// Section headings are the only stable hooks on the offer page
const DESCRIPTION_BLOCK = 'text="Job description" >> nth=0 >> xpath=../..';
const TECH_STACK_BLOCK = 'text="Tech stack" >> nth=0 >> xpath=..';

export const JUSTJOINIT_CATEGORIES: Record<string, string> = {
  testing:
    'https://justjoin.it/job-offers/remote/testing?employment-type=b2b,permanent&workplace=hybrid&working-hours=full-time&keyword=python&orderBy=DESC&sortBy=published',
  python:
    'https://justjoin.it/job-offers/remote/python?employment-type=b2b,permanent&experience-level=junior,mid&keyword=python&workplace=hybrid&working-hours=full-time&orderBy=DESC&sortBy=published',
  devops:
    'https://justjoin.it/job-offers/remote/devops?employment-type=b2b,permanent&experience-level=junior,mid&workplace=hybrid&working-hours=full-time&keyword=python&orderBy=DESC&sortBy=published',
  ml:
    'https://justjoin.it/job-offers/remote/ai?employment-type=b2b,permanent&experience-level=junior,mid&workplace=hybrid&working-hours=full-time&keyword=python&orderBy=DESC&sortBy=published',
};

/**
 * JustJoinIt renders a virtualized, infinitely scrolling list of offer cards,
 * so links are collected at every scroll step.
 */
export class JustJoinItAdapter implements SiteAdapter {
  name: string;
  seeds: string[];
  cookieAcceptLabel = 'Accept All';

  constructor(name: string, seed: string) {
    this.name = name;
    this.seeds = [seed];
  }

  async discoverListUrls(page: ScrapePage): Promise<Set<string>> {
    const hrefs = await scrollAndCollect(page, OFFER_CARD, 'href');
    const urls = new Set<string>();
    for (const href of hrefs) {
      urls.add(new URL(href, BASE_URL).toString());
    }
    console.log(`[JustJoinIt] ${this.name}: collected ${urls.size} offer links`);
    return urls;
  }

  async extractDescription(page: ScrapePage): Promise<string | null> {
    const techStack = await page.innerText(TECH_STACK_BLOCK, CONTENT_TIMEOUT_MS);
    const description = await page.innerText(DESCRIPTION_BLOCK, CONTENT_TIMEOUT_MS);
    if (!description.trim()) return null;
    return `${techStack} | ${description}`;
  }
}
