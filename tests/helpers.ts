import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { createApp, AppContext, AppOverrides } from '../src/app.js';
import { RagConfig, RagConfigInput, RagConfigSchema } from '../src/types/config.js';
import { ChatMessage, GenerateOptions, GenerationProvider } from '../src/types/provider.js';
import { HashEmbeddingProvider } from '../src/providers/embedding/hash.js';
import { ApiError } from '../src/utils/errors.js';
import { Logger } from '../src/utils/logger.js';

export const silentLogger = new Logger('silent');

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'ragrelay-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function testConfig(dataDir: string, input: RagConfigInput = {}): RagConfig {
  return RagConfigSchema.parse({
    ...input,
    storage: { dataDir, databasePath: ':memory:', ...input.storage },
    logging: { level: 'silent' },
  });
}

export async function createTestApp(
  dataDir: string,
  overrides: AppOverrides = {},
  input: RagConfigInput = {}
): Promise<AppContext> {
  return createApp(testConfig(dataDir, input), {
    embeddings: new HashEmbeddingProvider(64),
    providers: [new ScriptedProvider('primary')],
    logger: silentLogger,
    ...overrides,
  });
}

export interface Script {
  fragments?: string[];
  /** Throw after this many fragments have been yielded. */
  failAfter?: number;
  /** Pause before every fragment after the first; aborting the request ends the pause. */
  delayMs?: number;
  healthy?: boolean;
}

/**
 * Generation provider that replays a fixed script and records how it was called.
 */
export class ScriptedProvider implements GenerationProvider {
  readonly model = 'scripted';
  calls = 0;
  lastMessages: ChatMessage[] = [];

  constructor(
    readonly name: string,
    private script: Script = {}
  ) {}

  async *stream(messages: ChatMessage[], options: GenerateOptions = {}): AsyncGenerator<string> {
    this.calls++;
    this.lastMessages = messages;
    const fragments = this.script.fragments ?? ['Hello', ' world'];

    for (let i = 0; ; i++) {
      if (this.script.failAfter === i) {
        throw new ApiError(`${this.name} is down`, this.name);
      }
      const fragment = fragments[i];
      if (fragment === undefined) return;
      if (i > 0 && this.script.delayMs !== undefined) {
        await sleep(this.script.delayMs, options.signal);
      }
      yield fragment;
    }
  }

  /** Change the behaviour of later calls. */
  rescript(script: Script): void {
    this.script = script;
  }

  async checkHealth(): Promise<boolean> {
    return this.script.healthy ?? true;
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true }
    );
  });
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

/** Plain-text document of `paragraphs` paragraphs, each a few sentences long. */
export function sampleText(paragraphs: number, topic: string = 'river'): string {
  const sentences = [
    `The ${topic} survey began in early spring with a small field team.`,
    `Each ${topic} station recorded temperature, flow and sediment twice a day.`,
    `Volunteers logged their notes in shared notebooks before returning to camp.`,
    `By the end of the season the ${topic} dataset covered more than forty sites.`,
  ];
  return Array.from({ length: paragraphs }, (_, i) => `Section ${i + 1}. ${sentences.join(' ')}`).join('\n\n');
}
