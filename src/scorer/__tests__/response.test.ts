import { describe, it, expect, beforeEach, vi } from 'vitest';
import { analysisText, cleanModelResponse, extractJsonObject, extractRatings } from '../response';

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('extractJsonObject', () => {
  it('returns the first balanced object, ignoring braces inside strings', () => {
    expect(extractJsonObject('Result: {"opinia": "use {curly} braces", "n": {"x": 1}} done')).toBe(
      '{"opinia": "use {curly} braces", "n": {"x": 1}}'
    );
  });

  it('returns an unclosed object up to the end of the text', () => {
    expect(extractJsonObject('{"ocena_oferty": 55, "opinia": "ok"')).toBe('{"ocena_oferty": 55, "opinia": "ok"');
  });

  it('returns null without an object', () => {
    expect(extractJsonObject('no json here')).toBeNull();
  });
});

describe('cleanModelResponse', () => {
  it('drops reasoning blocks and repairs trailing commas', () => {
    const parsed = cleanModelResponse('<think>weighing {the} offer</think>\n{"ocena_oferty":80,}');

    expect(parsed).toEqual({ ocena_oferty: 80 });
    expect(extractRatings(parsed)).toEqual({ offerRating: 80, candidateRating: 0 });
  });

  it('closes an object cut off mid-way', () => {
    expect(cleanModelResponse('{"ocena_oferty": 55, "opinia": "ok"')).toEqual({ ocena_oferty: 55, opinia: 'ok' });
  });

  it('falls back to the cleaned text when there is no object', () => {
    expect(cleanModelResponse('<think>hmm</think>  Brak danych  ')).toBe('Brak danych');
  });
});

describe('extractRatings', () => {
  it('rounds and clamps structured ratings', () => {
    expect(extractRatings({ ocena_oferty: 140, dopasowanie_kandydata: '72.6' })).toEqual({
      offerRating: 100,
      candidateRating: 73,
    });
    expect(extractRatings({ ocena_oferty: -5, dopasowanie_kandydata: 'n/a' })).toEqual({
      offerRating: 0,
      candidateRating: 0,
    });
  });

  it('reads tagged ratings from plain text', () => {
    expect(extractRatings('Dobra oferta [ocena_oferty=75] [dopasowanie_kandydata=40]')).toEqual({
      offerRating: 75,
      candidateRating: 40,
    });
    expect(extractRatings('Dobra oferta')).toEqual({ offerRating: null, candidateRating: null });
  });
});

describe('analysisText', () => {
  it('serializes objects and passes text through', () => {
    expect(analysisText({ ocena_oferty: 80 })).toBe('{"ocena_oferty":80}');
    expect(analysisText('plain')).toBe('plain');
  });
});
