import { z } from 'zod';
import { ChatMessage, GenerateOptions, GenerationProvider } from '../../types/provider.js';
import { ApiError, errorMessage, isAbortError } from '../../utils/errors.js';
import { combineSignals, readLines, safeText } from '../../utils/streams.js';

const ChatChunkSchema = z.object({
  message: z.object({ content: z.string().optional() }).optional(),
  done: z.boolean().optional(),
  error: z.string().optional(),
});

export interface OllamaGenerationOptions {
  baseUrl: string;
  model: string;
  healthCheckTimeoutMs?: number;
}

/**
 * Local generation through an Ollama server (`/api/chat`, newline-delimited JSON stream).
 */
export class OllamaGenerationProvider implements GenerationProvider {
  readonly name = 'ollama';
  readonly model: string;
  private baseUrl: string;
  private healthCheckTimeoutMs: number;

  constructor(options: OllamaGenerationOptions) {
    // Node resolves "localhost" to ::1 first while Ollama listens on IPv4 by default.
    this.baseUrl = options.baseUrl.replace('://localhost', '://127.0.0.1').replace(/\/+$/, '');
    this.model = options.model;
    this.healthCheckTimeoutMs = options.healthCheckTimeoutMs ?? 5_000;
  }

  async *stream(messages: ChatMessage[], options: GenerateOptions = {}): AsyncGenerator<string> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          messages,
          stream: true,
          ...(options.temperature !== undefined && { options: { temperature: options.temperature } }),
        }),
        signal: options.signal ?? null,
      });
    } catch (error) {
      if (isAbortError(error)) throw error;
      throw new ApiError(`Ollama request failed: ${errorMessage(error)}`, this.name);
    }

    if (!response.ok || !response.body) {
      throw new ApiError(
        `Ollama responded ${response.status} ${response.statusText}: ${await safeText(response)}`,
        this.name,
        response.status
      );
    }

    try {
      for await (const line of readLines(response.body)) {
        if (!line.trim()) continue;

        const chunk = parseChunk(line);
        if (!chunk) continue;
        if (chunk.error) {
          throw new ApiError(`Ollama stream error: ${chunk.error}`, this.name);
        }

        const content = chunk.message?.content;
        if (content) {
          yield content;
        }
        if (chunk.done) return;
      }
    } catch (error) {
      if (isAbortError(error) || error instanceof ApiError) throw error;
      throw new ApiError(`Ollama stream failed: ${errorMessage(error)}`, this.name);
    }
  }

  async checkHealth(signal?: AbortSignal): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        signal: combineSignals([signal], this.healthCheckTimeoutMs),
      });
      return response.ok;
    } catch {
      return false;
    }
  }
}

function parseChunk(line: string): z.infer<typeof ChatChunkSchema> | undefined {
  try {
    const parsed = ChatChunkSchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}
