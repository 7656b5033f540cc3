export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimension: number;

  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface GenerateOptions {
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
}

/**
 * A text-generation backend. `stream` yields response fragments in order and
 * rejects with `ApiError` when the backend cannot be reached or answers with an error.
 */
export interface GenerationProvider {
  readonly name: string;
  readonly model: string;

  stream(messages: ChatMessage[], options?: GenerateOptions): AsyncIterable<string>;
  checkHealth(signal?: AbortSignal): Promise<boolean>;
}

export interface ProviderHealth {
  name: string;
  available: boolean;
  lastChecked: string | null;
  lastError: string | null;
}
