export class JobRadarError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Navigation, reload or wait that ran out of time. Retried by the extractor.
export class TransientFetchError extends JobRadarError {}

export class BotBlockedError extends JobRadarError {
  readonly url: string;
  readonly title: string;

  constructor(url: string, title: string) {
    super(`Anti-bot page detected on ${url} (title: "${title}")`);
    this.url = url;
    this.title = title;
  }
}

export class FetchCancelledError extends JobRadarError {
  readonly url: string;

  constructor(url: string, options?: { cause?: unknown }) {
    super(`Fetch cancelled for ${url}`, options);
    this.url = url;
  }
}

export class MalformedResponseError extends JobRadarError {}

export class UpstreamServiceError extends JobRadarError {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export class ScoringAuthError extends UpstreamServiceError {}

export class ScoringRateLimitError extends UpstreamServiceError {}

export class ScoringServiceError extends UpstreamServiceError {}

export class ConfigError extends JobRadarError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
