import { z } from 'zod';
import { BaseAIProvider, RetryOptions } from '../base.js';
import { EmbeddingProvider } from '../../types/provider.js';
import { ApiError, EmbeddingUnavailableError, errorMessage } from '../../utils/errors.js';
import { safeText } from '../../utils/streams.js';

const EmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

export interface OllamaEmbeddingOptions extends RetryOptions {
  baseUrl: string;
  model: string;
  dimension?: number;
  timeoutMs?: number;
}

export class OllamaEmbeddingProvider extends BaseAIProvider implements EmbeddingProvider {
  readonly name = 'ollama';
  readonly model: string;
  readonly dimension: number;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(options: OllamaEmbeddingOptions) {
    super(options);
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.model = options.model;
    this.dimension = options.dimension ?? 768;
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    if (!embedding) {
      throw new EmbeddingUnavailableError('Ollama returned no embedding', this.name);
    }
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.validateBatchTexts(texts);

    try {
      const embeddings = await this.withRetry(() => this.requestEmbeddings(texts));
      if (embeddings.length !== texts.length) {
        throw new ApiError(`Expected ${texts.length} embeddings, got ${embeddings.length}`, this.name);
      }
      return embeddings;
    } catch (error) {
      throw new EmbeddingUnavailableError(`Failed to generate embeddings: ${errorMessage(error)}`, this.name);
    }
  }

  private async requestEmbeddings(texts: string[]): Promise<number[][]> {
    const response = await fetch(`${this.baseUrl}/api/embed`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model: this.model, input: texts }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new ApiError(`Embedding failed: ${response.status} ${response.statusText} - ${await safeText(response)}`, this.name, response.status);
    }

    const parsed = EmbedResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ApiError('Invalid embedding response shape', this.name);
    }
    return parsed.data.embeddings;
  }
}
