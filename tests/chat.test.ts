import { describe, it, expect, afterEach } from 'vitest';
import { AppContext } from '../src/app.js';
import { CONTEXT_HEADER, buildContextBlock } from '../src/services/chat.js';
import { NoProviderAvailableError, StreamInterruptedError, ValidationError } from '../src/utils/errors.js';
import { ScriptedProvider, collect, createTestApp, makeTempDir, removeTempDir, sampleText } from './helpers.js';

const encoder = new TextEncoder();

describe('ChatOrchestrator', () => {
  let dataDir: string | undefined;
  let app: AppContext | undefined;

  async function setup(...providers: ScriptedProvider[]): Promise<AppContext> {
    dataDir = await makeTempDir();
    app = await createTestApp(dataDir, { providers: providers.length > 0 ? providers : [new ScriptedProvider('primary')] });
    return app;
  }

  afterEach(async () => {
    await app?.close();
    if (dataDir) await removeTempDir(dataDir);
    app = undefined;
    dataDir = undefined;
  });

  it('stores the user message and the complete answer', async () => {
    const { chat, conversations } = await setup();

    const result = await chat.respond({ message: '  hi  ' });

    expect(result).toMatchObject({ state: 'done', response: 'Hello world', status: 'complete', cancelled: false });
    const stored = conversations.get(result.conversationId);
    expect(stored.title).toBe('hi');
    expect(stored.messages.map(message => [message.role, message.content, message.status])).toEqual([
      ['user', 'hi', 'complete'],
      ['assistant', 'Hello world', 'complete'],
    ]);
  });

  it('stores the streamed fragments exactly as they were sent', async () => {
    const { chat, conversations } = await setup(new ScriptedProvider('primary', { fragments: ['The ', 'survey ', 'ended.'] }));

    const stream = chat.chat({ message: 'When did it end?' });
    const fragments = await collect(stream.fragments);
    const result = await stream.done;

    expect(fragments).toEqual(['The ', 'survey ', 'ended.']);
    expect(result.message?.content).toBe(fragments.join(''));
    expect(conversations.get(stream.conversationId).messages[1]?.content).toBe('The survey ended.');
  });

  it('stores no answer when every provider fails', async () => {
    const { chat, conversations } = await setup(
      new ScriptedProvider('primary', { failAfter: 0 }),
      new ScriptedProvider('secondary', { failAfter: 0 })
    );

    const stream = chat.chat({ message: 'hi', conversationId: 'conv-1' });
    await expect(collect(stream.fragments)).rejects.toBeInstanceOf(NoProviderAvailableError);
    const result = await stream.done;

    expect(result).toMatchObject({ state: 'failed', status: null, message: null });
    expect(conversations.get('conv-1').messages.map(message => message.role)).toEqual(['user']);
  });

  it('falls back to the secondary provider without the caller noticing', async () => {
    const primary = new ScriptedProvider('primary', { failAfter: 0 });
    const secondary = new ScriptedProvider('secondary', { fragments: ['fallback'] });
    const { chat, health } = await setup(primary, secondary);

    expect((await chat.respond({ message: 'hi' })).response).toBe('fallback');
    expect(health.get('primary').available).toBe(false);

    await chat.respond({ message: 'again' });
    expect(primary.calls).toBe(1);
    expect(secondary.calls).toBe(2);
  });

  it('keeps a partial answer marked incomplete when the stream breaks', async () => {
    const { chat, conversations } = await setup(new ScriptedProvider('primary', { fragments: ['Par', 'tial'], failAfter: 1 }));

    await expect(chat.respond({ message: 'hi', conversationId: 'conv-1' })).rejects.toBeInstanceOf(StreamInterruptedError);

    const assistant = conversations.get('conv-1').messages[1];
    expect(assistant).toMatchObject({ role: 'assistant', content: 'Par', status: 'incomplete' });
  });

  it('stops generating when the consumer goes away', async () => {
    const provider = new ScriptedProvider('primary', { fragments: ['first', ' second', ' third'], delayMs: 5_000 });
    const { chat, conversations, health } = await setup(provider);

    const stream = chat.chat({ message: 'hi', conversationId: 'conv-1' });
    for await (const fragment of stream.fragments) {
      expect(fragment).toBe('first');
      break;
    }
    const result = await stream.done;

    expect(result).toMatchObject({ cancelled: true, state: 'failed', response: 'first', status: 'incomplete' });
    expect(result.error).toBeUndefined();
    expect(conversations.get('conv-1').messages[1]).toMatchObject({ content: 'first', status: 'incomplete' });
    expect(health.get('primary').available).toBe(true);
  });

  it('cancels through the caller signal', async () => {
    const provider = new ScriptedProvider('primary', { fragments: ['first', ' second'], delayMs: 5_000 });
    const { chat } = await setup(provider);
    const controller = new AbortController();

    const stream = chat.chat({ message: 'hi' }, { signal: controller.signal });
    const iterator = stream.fragments[Symbol.asyncIterator]();
    expect(await iterator.next()).toEqual({ value: 'first', done: false });
    controller.abort();

    const result = await stream.done;
    expect(result.cancelled).toBe(true);
    expect(result.response).toBe('first');
  });

  it('sends earlier turns as history', async () => {
    const provider = new ScriptedProvider('primary', { fragments: ['ok'] });
    const { chat } = await setup(provider);

    await chat.respond({ message: 'first question', conversationId: 'conv-1' });
    await chat.respond({ message: 'second question', conversationId: 'conv-1' });

    expect(provider.lastMessages.map(message => [message.role, message.content])).toEqual([
      ['system', app?.config.generation.systemPrompt],
      ['user', 'first question'],
      ['assistant', 'ok'],
      ['user', 'second question'],
    ]);
  });

  it('serialises concurrent exchanges on one conversation', async () => {
    const { chat, conversations } = await setup(new ScriptedProvider('primary', { fragments: ['a', 'b'], delayMs: 10 }));

    await Promise.all([
      chat.respond({ message: 'one', conversationId: 'conv-1' }),
      chat.respond({ message: 'two', conversationId: 'conv-1' }),
    ]);

    expect(conversations.get('conv-1').messages.map(message => message.content)).toEqual(['one', 'ab', 'two', 'ab']);
  });

  it('adds retrieved context when documents are selected', async () => {
    const provider = new ScriptedProvider('primary', { fragments: ['answer'] });
    const { chat, documents, conversations } = await setup(provider);
    const uploaded = await documents.upload({ filename: 'survey.txt', content: encoder.encode(sampleText(2)) });
    await documents.whenIngested(uploaded.id);

    const result = await chat.respond({ message: 'river station temperature', documentIds: [uploaded.id] });

    expect(result.sources.length).toBeGreaterThan(0);
    expect(result.sources.every(source => source.documentId === uploaded.id)).toBe(true);
    const system = provider.lastMessages[0]?.content ?? '';
    expect(system).toContain(CONTEXT_HEADER);
    expect(system).toContain(buildContextBlock(result.sources));
    expect(conversations.get(result.conversationId).messages[1]?.sources).toEqual(
      result.sources.map(source => source.chunkId)
    );
  });

  it('does not retrieve when no documents are selected', async () => {
    const provider = new ScriptedProvider('primary', { fragments: ['answer'] });
    const { chat, documents } = await setup(provider);
    const uploaded = await documents.upload({ filename: 'survey.txt', content: encoder.encode(sampleText(2)) });
    await documents.whenIngested(uploaded.id);

    const result = await chat.respond({ message: 'river station temperature' });

    expect(result.sources).toEqual([]);
    expect(provider.lastMessages[0]?.content).not.toContain(CONTEXT_HEADER);
  });

  it('rejects an empty message', async () => {
    const { chat } = await setup();
    expect(() => chat.chat({ message: '   ' })).toThrow(ValidationError);
  });
});

describe('buildContextBlock', () => {
  it('lists each chunk under its file name', () => {
    const block = buildContextBlock([
      { chunkId: 1, documentId: 'd1', filename: 'a.txt', chunkIndex: 0, text: 'alpha', score: 0.9 },
      { chunkId: 2, documentId: 'd2', filename: 'b.txt', chunkIndex: 3, text: 'beta', score: 0.5 },
    ]);

    expect(block).toBe(
      'Context information is below.\n---------------------\n' +
        '[a.txt]\nalpha\n\n[b.txt]\nbeta\n' +
        '---------------------\nGiven the context information and not prior knowledge, answer the query.'
    );
  });
});
