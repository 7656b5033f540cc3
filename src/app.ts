import path from 'path';
import { RagConfig } from './types/config.js';
import { EmbeddingProvider, GenerationProvider } from './types/provider.js';
import { ProviderFactory } from './providers/factory.js';
import { DatabaseService } from './services/database.js';
import { VectorIndex } from './services/vector-index.js';
import { DocumentService } from './services/document.js';
import { Retriever } from './services/retriever.js';
import { ConversationStore } from './services/conversation-store.js';
import { ProviderHealthRegistry, Clock } from './services/provider-health.js';
import { ModelRouter } from './services/model-router.js';
import { ChatOrchestrator } from './services/chat.js';
import { Logger, logger as rootLogger } from './utils/logger.js';

export interface AppOverrides {
  embeddings?: EmbeddingProvider;
  providers?: GenerationProvider[];
  clock?: Clock;
  logger?: Logger;
}

export interface AppContext {
  config: RagConfig;
  logger: Logger;
  db: DatabaseService;
  index: VectorIndex;
  embeddings: EmbeddingProvider;
  documents: DocumentService;
  retriever: Retriever;
  conversations: ConversationStore;
  health: ProviderHealthRegistry;
  router: ModelRouter;
  chat: ChatOrchestrator;
  close(): Promise<void>;
}

/**
 * Wire every service from configuration, open the database and rebuild the vector index.
 */
export async function createApp(config: RagConfig, overrides: AppOverrides = {}): Promise<AppContext> {
  const logger = overrides.logger ?? rootLogger;
  logger.setLevel(config.logging.level);

  const databasePath = config.storage.databasePath ?? path.join(config.storage.dataDir, 'ragrelay.db');
  const db = new DatabaseService(databasePath, logger);
  db.initialize();

  const embeddings = overrides.embeddings ?? ProviderFactory.createEmbeddingProvider(config);
  const providers = overrides.providers ?? ProviderFactory.createGenerationProviders(config, logger);

  const index = new VectorIndex(embeddings.dimension);
  const documents = new DocumentService(
    db,
    index,
    embeddings,
    {
      chunking: config.chunking,
      uploadDir: path.join(config.storage.dataDir, 'uploads'),
      batchSize: config.embedding.batchSize,
      maxUploadBytes: config.server.maxUploadBytes,
    },
    logger
  );
  const retriever = new Retriever(
    embeddings,
    index,
    db,
    { k: config.retrieval.topK, minScore: config.retrieval.minScore },
    logger
  );
  const conversations = new ConversationStore(db);
  const health = new ProviderHealthRegistry(
    providers.map(provider => provider.name),
    config.generation.cooldownMs,
    overrides.clock
  );
  const router = new ModelRouter(providers, health, {
    healthCheckTimeoutMs: config.generation.healthCheckTimeoutMs,
    logger,
  });
  const chat = new ChatOrchestrator(conversations, retriever, router, {
    systemPrompt: config.generation.systemPrompt,
    history: config.history,
    topK: config.retrieval.topK,
    bufferSize: config.server.streamBufferSize,
    logger,
  });

  await documents.initialize();
  logger.info('app.ready', {
    embeddings: `${embeddings.name}:${embeddings.model}`,
    providers: router.providerNames,
    database: databasePath,
  });

  return {
    config,
    logger,
    db,
    index,
    embeddings,
    documents,
    retriever,
    conversations,
    health,
    router,
    chat,
    async close() {
      await documents.waitForIdle();
      db.close();
    },
  };
}
