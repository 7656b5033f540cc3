export { createApp } from './app.js';
export type { AppContext, AppOverrides } from './app.js';
export { APP_NAME, APP_VERSION } from './constants.js';

export { ConfigManager } from './utils/config.js';
export { RagConfigSchema, createDefaultConfig } from './types/config.js';
export type { RagConfig, RagConfigInput, EmbeddingBackend, GenerationProviderName } from './types/config.js';

export { DatabaseService } from './services/database.js';
export { VectorIndex } from './services/vector-index.js';
export { DocumentService } from './services/document.js';
export { Retriever } from './services/retriever.js';
export { ConversationStore } from './services/conversation-store.js';
export { ProviderHealthRegistry } from './services/provider-health.js';
export { ModelRouter } from './services/model-router.js';
export { ChatOrchestrator, buildContextBlock } from './services/chat.js';
export type { ChatRequest, ChatResult, ChatStream, ChatState } from './services/chat.js';

export { ProviderFactory } from './providers/factory.js';
export { HashEmbeddingProvider } from './providers/embedding/hash.js';
export { OllamaEmbeddingProvider } from './providers/embedding/ollama.js';
export { OpenAIEmbeddingProvider } from './providers/embedding/openai.js';
export { OllamaGenerationProvider } from './providers/generation/ollama.js';
export { OpenAIGenerationProvider } from './providers/generation/openai.js';
export { MockGenerationProvider } from './providers/generation/mock.js';

export { createHandler } from './server/router.js';
export { startServer } from './server/http.js';
export type { RunningServer } from './server/http.js';

export { TextChunker } from './utils/chunking.js';
export type { ChunkingOptions, TextChunk } from './utils/chunking.js';
export { Logger } from './utils/logger.js';
export * from './utils/errors.js';

export type * from './types/document.js';
export type * from './types/conversation.js';
export type * from './types/search.js';
export type * from './types/provider.js';
