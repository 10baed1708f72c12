import type { ScrapePage } from './browser';
import type { DedupePolicy } from './canonical';

export interface JobOffer {
  name: string;
  source: string;
  url: string;
  description: string;
  analysis: string;
  offerRating: number;
  candidateRating: number;
  added: Date;
}

export interface SiteAdapter {
  /** Identifier stored in the `source` column. */
  name: string;
  /** Listing pages discovery starts from. */
  seeds: string[];
  /** Visible label of the cookie banner's accept button. */
  cookieAcceptLabel?: string;
  /** Applied to discovered URLs after the store filter. */
  dedupePolicy?: DedupePolicy;

  discoverListUrls(page: ScrapePage, seed: string): Promise<Set<string>>;
  /**
   * Returns the raw description, or null when the page has no such content.
   * Throws TransientFetchError when waiting for the content timed out.
   */
  extractDescription(page: ScrapePage): Promise<string | null>;

  /** Paginated sources report the last page number of a listing. */
  maxPageNumber?(page: ScrapePage): Promise<number | null>;
  pageUrl?(seed: string, pageNumber: number): string;
}

/** Existence lookup the extractor filters against. */
export interface OfferLookup {
  exists(url: string): boolean;
}
