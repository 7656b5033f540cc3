import { EmbeddingProvider, GenerationProvider } from '../types/provider.js';
import { EmbeddingBackend, GenerationProviderName, RagConfig } from '../types/config.js';
import { HashEmbeddingProvider } from './embedding/hash.js';
import { OllamaEmbeddingProvider } from './embedding/ollama.js';
import { OpenAIEmbeddingProvider } from './embedding/openai.js';
import { OllamaGenerationProvider } from './generation/ollama.js';
import { OpenAIGenerationProvider } from './generation/openai.js';
import { MockGenerationProvider } from './generation/mock.js';
import { ConfigurationError } from '../utils/errors.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';

export class ProviderFactory {
  static createEmbeddingProvider(config: RagConfig): EmbeddingProvider {
    const backend: EmbeddingBackend = config.embedding.backend;

    switch (backend) {
      case 'hash':
        return new HashEmbeddingProvider(config.embedding.dimension);
      case 'ollama':
        return new OllamaEmbeddingProvider({
          baseUrl: config.providers.ollama.baseUrl,
          model: config.providers.ollama.embeddingModel,
          dimension: config.embedding.dimension,
        });
      case 'openai': {
        const apiKey = config.providers.openai.apiKey;
        if (!apiKey) {
          throw new ConfigurationError('OPENAI_API_KEY is required for the openai embedding backend');
        }
        return new OpenAIEmbeddingProvider({
          apiKey,
          baseUrl: config.providers.openai.baseUrl,
          model: config.providers.openai.embeddingModel,
          dimension: config.embedding.dimension,
        });
      }
      default:
        throw new ConfigurationError(`Unsupported embedding backend: ${String(backend)}`);
    }
  }

  /**
   * Generation providers in priority order. Providers that lack required settings are
   * left out with a warning; mock mode replaces the whole list.
   */
  static createGenerationProviders(config: RagConfig, log: Logger = rootLogger): GenerationProvider[] {
    if (config.generation.mock) {
      log.info('providers.mock_mode');
      return [new MockGenerationProvider()];
    }

    const providers: GenerationProvider[] = [];
    const seen = new Set<GenerationProviderName>();

    for (const name of config.generation.priority) {
      if (seen.has(name)) continue;
      seen.add(name);

      const provider = this.createGenerationProvider(name, config);
      if (provider) {
        providers.push(provider);
      } else {
        log.warn('providers.skipped', { provider: name, reason: 'not configured' });
      }
    }

    if (providers.length === 0) {
      throw new ConfigurationError('At least one generation provider must be configured');
    }
    return providers;
  }

  static createGenerationProvider(name: GenerationProviderName, config: RagConfig): GenerationProvider | undefined {
    const { healthCheckTimeoutMs } = config.generation;

    switch (name) {
      case 'ollama':
        return new OllamaGenerationProvider({
          baseUrl: config.providers.ollama.baseUrl,
          model: config.providers.ollama.model,
          healthCheckTimeoutMs,
        });
      case 'openai': {
        const { apiKey, baseUrl, model, maxTokens } = config.providers.openai;
        if (!apiKey) return undefined;
        return new OpenAIGenerationProvider({ apiKey, baseUrl, model, maxTokens, healthCheckTimeoutMs });
      }
      case 'mock':
        return new MockGenerationProvider();
      default:
        throw new ConfigurationError(`Unsupported provider: ${String(name)}`);
    }
  }
}
