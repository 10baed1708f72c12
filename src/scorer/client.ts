import OpenAI from 'openai';
import {
  ScoringAuthError,
  ScoringRateLimitError,
  ScoringServiceError,
} from '../errors';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  model: string;
  temperature: number;
  topP: number;
  maxTokens: number;
  jsonMode: boolean;
}

export interface ScoringClient {
  /**
   * Returns the model's raw text. Throws ScoringAuthError,
   * ScoringRateLimitError or ScoringServiceError.
   */
  complete(request: CompletionRequest): Promise<string>;
}

/** Chat completions against any OpenAI-compatible endpoint (DeepSeek by default). */
export class OpenAiScoringClient implements ScoringClient {
  private client: OpenAI;

  constructor(apiKey: string, baseURL: string) {
    // Failures surface to the caller for that one offer, never retried here
    this.client = new OpenAI({ apiKey, baseURL, maxRetries: 0 });
  }

  async complete(request: CompletionRequest): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: request.model,
        messages: request.messages,
        temperature: request.temperature,
        top_p: request.topP,
        max_tokens: request.maxTokens,
        ...(request.jsonMode ? { response_format: { type: 'json_object' as const } } : {}),
      });
      return response.choices[0]?.message?.content ?? '';
    } catch (error) {
      if (error instanceof OpenAI.AuthenticationError) {
        throw new ScoringAuthError(`Scoring service rejected credentials: ${error.message}`, error.status, { cause: error });
      }
      if (error instanceof OpenAI.RateLimitError) {
        throw new ScoringRateLimitError(`Scoring service rate limit: ${error.message}`, error.status, { cause: error });
      }
      if (error instanceof OpenAI.APIError) {
        throw new ScoringServiceError(`Scoring service error: ${error.message}`, error.status, { cause: error });
      }
      throw error;
    }
  }
}
