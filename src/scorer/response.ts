import { jsonrepair } from 'jsonrepair';
import { errorMessage } from '../errors';

export type ParsedAnalysis = Record<string, unknown>;

export interface Ratings {
  offerRating: number | null;
  candidateRating: number | null;
}

const THINK_BLOCK = /<think>[\s\S]*?<\/think>\s*/g;

/**
 * Returns the first top-level `{...}` span, honouring strings and escapes.
 * An object left open at the end of the text is returned as-is so the repair
 * pass can close it.
 */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  return text.slice(start);
}

function isPlainObject(value: unknown): value is ParsedAnalysis {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Strips reasoning blocks and parses the model's JSON, repairing trailing
 * commas, missing quotes and unclosed brackets on the way. Anything that
 * still does not parse to an object comes back as the cleaned text.
 */
export function cleanModelResponse(raw: string): ParsedAnalysis | string {
  const cleaned = raw.replace(THINK_BLOCK, '').trim();
  const candidate = extractJsonObject(cleaned);
  if (candidate === null) {
    console.error('[Scorer] No JSON object found in the response');
    return cleaned;
  }

  try {
    const parsed: unknown = JSON.parse(jsonrepair(candidate));
    if (isPlainObject(parsed)) return parsed;
    console.error('[Scorer] Response JSON is not an object');
  } catch (err) {
    console.error(`[Scorer] JSON decoding error: ${errorMessage(err)}`);
    console.error(`[Scorer] Response content: ${candidate}`);
  }
  return cleaned;
}

function toRating(value: unknown): number | null {
  const num = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof num !== 'number' || !Number.isFinite(num)) return null;
  return Math.min(100, Math.max(0, Math.round(num)));
}

function tagRating(text: string, field: string): number | null {
  const match = new RegExp(`\\[${field}=(\\d+)`).exec(text);
  return match ? toRating(match[1]) : null;
}

/**
 * Structured responses default missing ratings to 0; plain text is searched
 * for `[ocena_oferty=NN]` style tags and yields null where none is present.
 */
export function extractRatings(response: ParsedAnalysis | string): Ratings {
  if (typeof response !== 'string') {
    return {
      offerRating: toRating(response.ocena_oferty) ?? 0,
      candidateRating: toRating(response.dopasowanie_kandydata) ?? 0,
    };
  }
  return {
    offerRating: tagRating(response, 'ocena_oferty'),
    candidateRating: tagRating(response, 'dopasowanie_kandydata'),
  };
}

export function analysisText(response: ParsedAnalysis | string): string {
  return typeof response === 'string' ? response : JSON.stringify(response);
}
