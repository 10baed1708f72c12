// Shared text filters for all site adapters

// Title fragments of interstitials served instead of the posting when a site
// decides the visitor is automated (Cloudflare, Akamai, DataDome, captchas)
export const FORBIDDEN_TITLE_PHRASES = [
  'just a moment',
  'attention required',
  'access denied',
  'are you a robot',
  'verify you are human',
  'captcha',
  'request unsuccessful',
  'pardon our interruption',
  'too many requests',
];

const HTML_TAG = /<[^>]*>/g;
const WHITESPACE = /\s+/g;

/**
 * True when the page title contains one of the forbidden phrases,
 * compared case-insensitively.
 */
export function isBotBlockedTitle(
  title: string,
  phrases: readonly string[] = FORBIDDEN_TITLE_PHRASES
): boolean {
  const lowered = title.toLowerCase();
  return phrases.some((phrase) => phrase.length > 0 && lowered.includes(phrase.toLowerCase()));
}

export function removeHtmlTags(text: string): string {
  return text.replace(HTML_TAG, '');
}

/** Collapses whitespace runs to single spaces and strips markup. */
export function simplifyText(text: string): string {
  return removeHtmlTags(text.replace(WHITESPACE, ' ')).trim();
}
