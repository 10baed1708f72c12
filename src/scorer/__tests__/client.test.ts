import { describe, it, expect, afterEach, vi } from 'vitest';
import OpenAI from 'openai';
import { Completions } from 'openai/resources/chat/completions';
import { ScoringAuthError, ScoringRateLimitError, ScoringServiceError } from '../../errors';
import { OpenAiScoringClient } from '../client';
import type { CompletionRequest } from '../client';

const request: CompletionRequest = {
  messages: [{ role: 'user', content: 'Full posting text for https://jobs.test/offer/alpha:\nPython' }],
  model: 'test-model',
  temperature: 0,
  topP: 1,
  maxTokens: 500,
  jsonMode: true,
};

// The SDK's own factory turns an HTTP status into the matching error class
const httpError = (status: number) => OpenAI.APIError.generate(status, { message: 'upstream said no' }, undefined, {});

describe('OpenAiScoringClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const client = () => new OpenAiScoringClient('test-secret', 'http://scoring.test/v1');

  it('sends a deterministic JSON-mode request', async () => {
    const create = vi.spyOn(Completions.prototype, 'create').mockRejectedValue(new Error('stop here'));

    await expect(client().complete(request)).rejects.toThrow('stop here');
    expect(create.mock.calls[0][0]).toMatchObject({
      model: 'test-model',
      temperature: 0,
      top_p: 1,
      max_tokens: 500,
      response_format: { type: 'json_object' },
    });
  });

  it('maps 401 to ScoringAuthError', async () => {
    vi.spyOn(Completions.prototype, 'create').mockRejectedValue(httpError(401));

    const error = await client().complete(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ScoringAuthError);
    expect(error).toMatchObject({ status: 401 });
  });

  it('maps 429 to ScoringRateLimitError', async () => {
    vi.spyOn(Completions.prototype, 'create').mockRejectedValue(httpError(429));

    const error = await client().complete(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ScoringRateLimitError);
    expect(error).toMatchObject({ status: 429 });
  });

  it('maps server errors to ScoringServiceError', async () => {
    vi.spyOn(Completions.prototype, 'create').mockRejectedValue(httpError(503));

    const error = await client().complete(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ScoringServiceError);
    expect(error).not.toBeInstanceOf(ScoringRateLimitError);
    expect(error).toMatchObject({ status: 503 });
  });

  it('lets errors from outside the SDK through unchanged', async () => {
    const failure = new Error('socket hang up');
    vi.spyOn(Completions.prototype, 'create').mockRejectedValue(failure);

    await expect(client().complete(request)).rejects.toBe(failure);
  });
});
