import OpenAI from 'openai';
import { BaseAIProvider, RetryOptions } from '../base.js';
import { EmbeddingProvider } from '../../types/provider.js';
import { EmbeddingUnavailableError, errorMessage } from '../../utils/errors.js';

const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

export interface OpenAIEmbeddingOptions extends RetryOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  dimension?: number;
}

export class OpenAIEmbeddingProvider extends BaseAIProvider implements EmbeddingProvider {
  readonly name = 'openai';
  readonly model: string;
  readonly dimension: number;
  private client: OpenAI;
  private requestedDimension: number | undefined;

  constructor(options: OpenAIEmbeddingOptions) {
    super(options);
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0 });
    this.model = options.model ?? 'text-embedding-3-small';
    // Only the text-embedding-3 family accepts a reduced output size.
    this.requestedDimension = this.model.startsWith('text-embedding-3') ? options.dimension : undefined;
    this.dimension = this.requestedDimension ?? MODEL_DIMENSIONS[this.model] ?? options.dimension ?? 1536;
  }

  async embed(text: string): Promise<number[]> {
    this.validateText(text);
    const [embedding] = await this.embedBatch([text]);
    if (!embedding) {
      throw new EmbeddingUnavailableError('OpenAI returned no embedding', this.name);
    }
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.validateBatchTexts(texts);

    try {
      const response = await this.withRetry(() =>
        this.client.embeddings.create({
          model: this.model,
          input: texts,
          ...(this.requestedDimension !== undefined && { dimensions: this.requestedDimension }),
        })
      );

      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map(item => item.embedding);
    } catch (error) {
      throw new EmbeddingUnavailableError(`Failed to generate batch embeddings: ${errorMessage(error)}`, this.name);
    }
  }
}
