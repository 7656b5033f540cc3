import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { promises as fs } from 'fs';
import { ConfigManager } from '../src/utils/config.js';
import { ValidationError } from '../src/utils/errors.js';
import { makeTempDir, removeTempDir } from './helpers.js';

describe('ConfigManager', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    configPath = path.join(dir, 'config.json');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('falls back to defaults without a file', async () => {
    const config = await new ConfigManager(configPath, {}).load();

    expect(config.server.port).toBe(8000);
    expect(config.embedding.backend).toBe('hash');
    expect(config.generation.priority).toEqual(['ollama', 'openai']);
    expect(config.generation.cooldownMs).toBe(30_000);
    expect(config.chunking).toEqual({ strategy: 'sentence', chunkSize: 500, overlap: 50 });
    expect(config.storage.databasePath).toBe(path.join(path.resolve('local_data'), 'ragrelay.db'));
  });

  it('lets the environment override the file', async () => {
    await fs.writeFile(configPath, JSON.stringify({ server: { port: 9000 }, retrieval: { topK: 5 } }));

    const config = await new ConfigManager(configPath, {
      PORT: '9100',
      RAG_PROVIDERS: 'openai, ollama',
      OPENAI_API_KEY: 'test-secret',
      LLM_MOCK_MODE: 'true',
    }).load();

    expect(config.server.port).toBe(9100);
    expect(config.retrieval.topK).toBe(5);
    expect(config.generation.priority).toEqual(['openai', 'ollama']);
    expect(config.generation.mock).toBe(true);
    expect(config.providers.openai.apiKey).toBe('test-secret');
  });

  it('rejects invalid values with the offending path', async () => {
    await fs.writeFile(configPath, JSON.stringify({ chunking: { chunkSize: 100, overlap: 100 } }));

    const failure = await new ConfigManager(configPath, {}).load().catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ValidationError);
    expect(failure).toHaveProperty('message', 'Invalid configuration: chunking.overlap: Overlap must be smaller than chunk size');
  });

  it('rejects a file that is not JSON', async () => {
    await fs.writeFile(configPath, 'port = 8000');

    await expect(new ConfigManager(configPath, {}).load()).rejects.toThrow('Configuration file contains invalid JSON');
  });

  it('saves a configuration that loads back', async () => {
    const manager = new ConfigManager(configPath, {});
    await manager.save({ chunking: { chunkSize: 800, overlap: 0.25 }, embedding: { backend: 'ollama' } });

    const config = await manager.load();

    expect(manager.exists()).toBe(true);
    expect(config.chunking.chunkSize).toBe(800);
    expect(config.chunking.overlap).toBe(0.25);
    expect(config.embedding.backend).toBe('ollama');
  });

  it('maps only the variables that are set', () => {
    expect(ConfigManager.fromEnvironment({ RAG_TOP_K: '7', HOST: '  ' })).toEqual({ retrieval: { topK: 7 } });
  });
});
