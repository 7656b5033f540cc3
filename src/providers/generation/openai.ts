import OpenAI from 'openai';
import { ChatMessage, GenerateOptions, GenerationProvider } from '../../types/provider.js';
import { ApiError, errorMessage, isAbortError } from '../../utils/errors.js';
import { combineSignals } from '../../utils/streams.js';

export interface OpenAIGenerationOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  maxTokens?: number;
  healthCheckTimeoutMs?: number;
}

/**
 * Cloud generation through the OpenAI chat completions API.
 * SDK retries are disabled: a failing call should fall through to the router quickly.
 */
export class OpenAIGenerationProvider implements GenerationProvider {
  readonly name = 'openai';
  readonly model: string;
  private client: OpenAI;
  private maxTokens: number;
  private healthCheckTimeoutMs: number;

  constructor(options: OpenAIGenerationOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0 });
    this.model = options.model ?? 'gpt-4o-mini';
    this.maxTokens = options.maxTokens ?? 1024;
    this.healthCheckTimeoutMs = options.healthCheckTimeoutMs ?? 5_000;
  }

  async *stream(messages: ChatMessage[], options: GenerateOptions = {}): AsyncGenerator<string> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: messages.map(message => ({ role: message.role, content: message.content })),
          stream: true,
          max_tokens: options.maxTokens ?? this.maxTokens,
          ...(options.temperature !== undefined && { temperature: options.temperature }),
        },
        { signal: options.signal ?? null }
      );

      for await (const chunk of completion) {
        const content = chunk.choices[0]?.delta?.content;
        if (content) {
          yield content;
        }
      }
    } catch (error) {
      throw this.toProviderError(error);
    }
  }

  async checkHealth(signal?: AbortSignal): Promise<boolean> {
    try {
      await this.client.models.list({ signal: combineSignals([signal], this.healthCheckTimeoutMs) });
      return true;
    } catch {
      return false;
    }
  }

  private toProviderError(error: unknown): unknown {
    if (isAbortError(error)) return error;
    const status = error instanceof OpenAI.APIError ? error.status : undefined;
    return new ApiError(`OpenAI request failed: ${errorMessage(error)}`, this.name, status);
  }
}
