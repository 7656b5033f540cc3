import { z } from 'zod';

export const DEFAULT_SYSTEM_PROMPT = `You are a helpful and knowledgeable assistant.

Guidelines for your responses:
- Be clear, accurate, and well-structured
- Use markdown formatting where it helps readability
- When providing steps or instructions, number them clearly
- If you don't know something, say so honestly`;

export const EmbeddingBackendSchema = z.enum(['hash', 'ollama', 'openai']);
export const GenerationProviderNameSchema = z.enum(['ollama', 'openai', 'mock']);
export const ChunkingStrategySchema = z.enum(['character', 'sentence', 'paragraph']);
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export type EmbeddingBackend = z.infer<typeof EmbeddingBackendSchema>;
export type GenerationProviderName = z.infer<typeof GenerationProviderNameSchema>;

export const ChunkingConfigSchema = z
  .object({
    strategy: ChunkingStrategySchema.default('sentence'),
    chunkSize: z.number().int().positive().default(500),
    // Characters when >= 1, fraction of chunkSize when < 1.
    overlap: z.number().nonnegative().default(50),
  })
  .refine(c => resolveOverlap(c.chunkSize, c.overlap) < c.chunkSize, {
    message: 'Overlap must be smaller than chunk size',
    path: ['overlap'],
  });

export const RagConfigSchema = z.object({
  version: z.string().default('0.1.0'),
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(0).max(65535).default(8000),
      streamBufferSize: z.number().int().min(1).max(1024).default(16),
      maxUploadBytes: z.number().int().positive().default(25 * 1024 * 1024),
    })
    .default({}),
  storage: z
    .object({
      dataDir: z.string().default('local_data'),
      databasePath: z.string().optional(),
    })
    .default({}),
  providers: z
    .object({
      ollama: z
        .object({
          baseUrl: z.string().url().default('http://127.0.0.1:11434'),
          model: z.string().default('llama3.1:8b'),
          embeddingModel: z.string().default('nomic-embed-text'),
        })
        .default({}),
      openai: z
        .object({
          apiKey: z.string().optional(),
          baseUrl: z.string().url().optional(),
          model: z.string().default('gpt-4o-mini'),
          embeddingModel: z.string().default('text-embedding-3-small'),
          maxTokens: z.number().int().positive().default(1024),
        })
        .default({}),
    })
    .default({}),
  generation: z
    .object({
      priority: z.array(GenerationProviderNameSchema).min(1).default(['ollama', 'openai']),
      cooldownMs: z.number().int().min(0).default(30_000),
      healthCheckTimeoutMs: z.number().int().positive().default(5_000),
      mock: z.boolean().default(false),
      systemPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
    })
    .default({}),
  embedding: z
    .object({
      backend: EmbeddingBackendSchema.default('hash'),
      dimension: z.number().int().positive().optional(),
      batchSize: z.number().int().min(1).max(2048).default(64),
    })
    .default({}),
  chunking: ChunkingConfigSchema.default({}),
  retrieval: z
    .object({
      topK: z.number().int().min(1).max(100).default(3),
      minScore: z.number().min(-1).max(1).default(0),
    })
    .default({}),
  history: z
    .object({
      maxMessages: z.number().int().min(1).default(10),
      maxTokens: z.number().int().positive().optional(),
    })
    .default({}),
  logging: z
    .object({
      level: LogLevelSchema.default('info'),
    })
    .default({}),
});

export type RagConfig = z.infer<typeof RagConfigSchema>;
export type RagConfigInput = z.input<typeof RagConfigSchema>;
export type ChunkingConfig = RagConfig['chunking'];

export function resolveOverlap(chunkSize: number, overlap: number): number {
  return overlap < 1 ? Math.floor(chunkSize * overlap) : Math.floor(overlap);
}

export function createDefaultConfig(): RagConfig {
  return RagConfigSchema.parse({});
}
