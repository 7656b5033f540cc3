import { existsSync, promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { RagConfig, RagConfigInput, RagConfigSchema } from '../types/config.js';
import { ValidationError, FileError } from './errors.js';

type ConfigRecord = Record<string, unknown>;

export class ConfigManager {
  private configPath: string;
  private configDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(customPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
    const explicitPath = customPath ?? env['RAG_CONFIG_PATH'];
    if (explicitPath) {
      this.configPath = path.resolve(explicitPath);
      this.configDir = path.dirname(this.configPath);
    } else {
      this.configDir = this.getDefaultConfigDir();
      this.configPath = path.join(this.configDir, 'config.json');
    }
  }

  private getDefaultConfigDir(): string {
    return path.join(os.homedir(), '.ragrelay');
  }

  exists(): boolean {
    return existsSync(this.configPath);
  }

  /**
   * Load configuration: config file (when present), then environment overrides, then schema defaults.
   */
  async load(): Promise<RagConfig> {
    const fileConfig = this.exists() ? await this.readConfigFile() : {};
    const merged = mergeDeep(fileConfig, ConfigManager.fromEnvironment(this.env));

    const result = RagConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ValidationError(`Invalid configuration: ${issues.join('; ')}`);
    }

    const config = result.data;
    config.storage.dataDir = path.resolve(config.storage.dataDir);
    if (!config.storage.databasePath) {
      config.storage.databasePath = path.join(config.storage.dataDir, 'ragrelay.db');
    }
    return config;
  }

  async save(config: RagConfigInput): Promise<void> {
    const result = RagConfigSchema.safeParse(config);
    if (!result.success) {
      throw new ValidationError(`Invalid configuration: ${result.error.message}`);
    }

    try {
      await fs.mkdir(this.configDir, { recursive: true });
      await fs.writeFile(this.configPath, JSON.stringify(result.data, null, 2), 'utf-8');
    } catch (error) {
      throw new FileError(`Failed to save configuration: ${String(error)}`);
    }
  }

  getConfigPath(): string {
    return this.configPath;
  }

  private async readConfigFile(): Promise<ConfigRecord> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      throw new FileError(`Failed to read configuration: ${String(error)}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      throw new ValidationError('Configuration file contains invalid JSON');
    }
    if (!isRecord(data)) {
      throw new ValidationError('Configuration file must contain a JSON object');
    }
    return data;
  }

  /**
   * Map recognised environment variables onto the configuration shape.
   * Values are left for the schema to validate.
   */
  static fromEnvironment(env: NodeJS.ProcessEnv): ConfigRecord {
    const config: ConfigRecord = {};
    const set = (keyPath: string, value: unknown): void => {
      if (value === undefined) return;
      const keys = keyPath.split('.');
      let target = config;
      for (const key of keys.slice(0, -1)) {
        const next = target[key];
        if (isRecord(next)) {
          target = next;
        } else {
          const created: ConfigRecord = {};
          target[key] = created;
          target = created;
        }
      }
      target[keys[keys.length - 1] ?? keyPath] = value;
    };

    const str = (name: string): string | undefined => {
      const value = env[name]?.trim();
      return value ? value : undefined;
    };
    const num = (name: string): number | undefined => {
      const value = str(name);
      return value === undefined ? undefined : Number(value);
    };
    const bool = (name: string): boolean | undefined => {
      const value = str(name);
      return value === undefined ? undefined : ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
    };

    set('server.host', str('HOST'));
    set('server.port', num('PORT'));
    set('storage.dataDir', str('RAG_DATA_DIR'));
    set('storage.databasePath', str('RAG_DATABASE_PATH'));

    set('embedding.backend', str('RAG_EMBEDDING_BACKEND'));
    set('embedding.dimension', num('RAG_EMBEDDING_DIMENSION'));
    set('embedding.batchSize', num('RAG_EMBEDDING_BATCH_SIZE'));

    const providers = str('RAG_PROVIDERS');
    set('generation.priority', providers?.split(',').map(name => name.trim()).filter(Boolean));
    set('generation.cooldownMs', num('RAG_PROVIDER_COOLDOWN_MS'));
    set('generation.mock', bool('LLM_MOCK_MODE'));

    set('providers.ollama.baseUrl', str('OLLAMA_BASE_URL'));
    set('providers.ollama.model', str('OLLAMA_MODEL'));
    set('providers.ollama.embeddingModel', str('OLLAMA_EMBEDDING_MODEL'));
    set('providers.openai.apiKey', str('OPENAI_API_KEY'));
    set('providers.openai.baseUrl', str('OPENAI_BASE_URL'));
    set('providers.openai.model', str('OPENAI_MODEL'));
    set('providers.openai.embeddingModel', str('OPENAI_EMBEDDING_MODEL'));

    set('chunking.strategy', str('RAG_CHUNK_STRATEGY'));
    set('chunking.chunkSize', num('RAG_CHUNK_SIZE'));
    set('chunking.overlap', num('RAG_CHUNK_OVERLAP'));

    set('retrieval.topK', num('RAG_TOP_K'));
    set('history.maxMessages', num('RAG_HISTORY_MAX_MESSAGES'));
    set('history.maxTokens', num('RAG_HISTORY_MAX_TOKENS'));

    set('logging.level', str('LOG_LEVEL'));

    return config;
  }
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeDeep(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    if (isRecord(value) && isRecord(existing)) {
      result[key] = mergeDeep(existing, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}
