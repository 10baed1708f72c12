export type DedupePolicy = 'first' | 'last' | 'max_id';

export interface CanonicalKey {
  host: string;
  path: string;
}

// Listing-id suffixes that mark re-published copies of the same posting,
// e.g. /praca/data-engineer-warszawa,oferta,1004285879
const LISTING_ID_SUFFIXES: RegExp[] = [/,oferta,(\d+)$/i];

/**
 * Canonical key of a posting URL plus its numeric listing id, if any.
 * Query string and fragment never contribute to the key.
 */
export function canonicalKeyAndId(url: string): { key: CanonicalKey; id: number | null } {
  const parsed = new URL(url);
  const host = parsed.host.toLowerCase();
  let path = parsed.pathname.replace(/\/+$/, '');
  let id: number | null = null;

  for (const suffix of LISTING_ID_SUFFIXES) {
    const match = suffix.exec(path);
    if (match) {
      id = Number.parseInt(match[1], 10);
      path = path.slice(0, match.index);
      break;
    }
  }

  return { key: { host, path: path.toLowerCase() }, id };
}

function keyString(key: CanonicalKey): string {
  return `${key.host}\u0000${key.path}`;
}

/**
 * Keeps one URL per canonical key.
 *
 * - `first` / `last`: by order of appearance
 * - `max_id`: highest listing id; URLs without an id rank below any id, and
 *   ties keep the earlier URL
 *
 * Survivors are returned in the order their key first appeared.
 */
export function dedupe(urls: readonly string[], policy: DedupePolicy = 'first'): string[] {
  const selected = new Map<string, { url: string; id: number | null }>();

  for (const url of urls) {
    const { key, id } = canonicalKeyAndId(url);
    const k = keyString(key);
    const current = selected.get(k);

    if (!current) {
      selected.set(k, { url, id });
      continue;
    }

    if (policy === 'last') {
      selected.set(k, { url, id });
    } else if (policy === 'max_id' && (current.id ?? -1) < (id ?? -1)) {
      selected.set(k, { url, id });
    }
  }

  // Replacing a Map entry keeps its original insertion slot
  return [...selected.values()].map((entry) => entry.url);
}
