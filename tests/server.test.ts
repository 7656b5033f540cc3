import { describe, it, expect, afterEach } from 'vitest';
import { z } from 'zod';
import { AppContext } from '../src/app.js';
import { createHandler } from '../src/server/router.js';
import { ScriptedProvider, createTestApp, makeTempDir, removeTempDir, sampleText } from './helpers.js';

const BASE = 'http://localhost:8000';

const ErrorBody = z.object({
  error: z.string(),
  message: z.string(),
  details: z.record(z.unknown()).optional(),
});
const ChatBody = z.object({
  conversation_id: z.string(),
  response: z.string(),
  sources: z.array(z.unknown()),
  timestamp: z.string(),
});
const ConversationBody = z.object({
  conversation_id: z.string(),
  title: z.string().nullable(),
  messages: z.array(
    z.object({
      id: z.number(),
      role: z.string(),
      content: z.string(),
      status: z.string(),
      sources: z.array(z.number()),
    })
  ),
});
const UploadBody = z.object({ document_id: z.string(), filename: z.string(), status: z.string() });
const DocumentView = z.object({
  id: z.string(),
  filename: z.string(),
  stored_filename: z.string(),
  status: z.string(),
  chunk_count: z.number(),
});
const HealthBody = z.object({
  status: z.string(),
  services: z.object({
    embeddings: z.string(),
    providers: z.array(z.object({ name: z.string(), available: z.boolean() })),
  }),
  index: z.object({ chunks: z.number(), documents: z.number() }),
});

async function read<T extends z.ZodTypeAny>(response: Response, schema: T): Promise<z.output<T>> {
  return schema.parse(await response.json());
}

describe('HTTP API', () => {
  let dataDir: string | undefined;
  let app: AppContext | undefined;

  async function setup(...providers: ScriptedProvider[]) {
    dataDir = await makeTempDir();
    app = await createTestApp(dataDir, { providers: providers.length > 0 ? providers : [new ScriptedProvider('primary')] });
    return { app, handle: createHandler(app) };
  }

  afterEach(async () => {
    await app?.close();
    if (dataDir) await removeTempDir(dataDir);
    app = undefined;
    dataDir = undefined;
  });

  function postJson(path: string, body: unknown): Request {
    return new Request(`${BASE}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  function upload(filename: string, content: string, type: string = 'text/plain'): Request {
    const form = new FormData();
    form.append('file', new Blob([content], { type }), filename);
    return new Request(`${BASE}/upload`, { method: 'POST', body: form });
  }

  describe('POST /chat', () => {
    it('answers with JSON and stores both messages', async () => {
      const { handle } = await setup();

      const response = await handle(postJson('/chat', { message: 'hi', stream: false }));
      expect(response.status).toBe(200);
      const body = await read(response, ChatBody);
      expect(body).toMatchObject({ response: 'Hello world', sources: [] });

      const conversation = await handle(new Request(`${BASE}/conversations/${body.conversation_id}`));
      const history = await read(conversation, ConversationBody);
      expect(history.messages).toHaveLength(2);
      expect(history.messages[1]).toMatchObject({ role: 'assistant', content: 'Hello world', status: 'complete' });
    });

    it('streams fragments as server-sent events', async () => {
      const { handle } = await setup();

      const response = await handle(postJson('/chat', { message: 'hi', stream: true, conversation_id: 'conv-1' }));

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('text/event-stream; charset=utf-8');
      expect(response.headers.get('x-conversation-id')).toBe('conv-1');
      expect(await response.text()).toBe('data: Hello\n\ndata:  world\n\ndata: [DONE]\n\n');

      const history = await read(await handle(new Request(`${BASE}/conversations/conv-1`)), ConversationBody);
      expect(history.messages[1]?.content).toBe('Hello world');
    });

    it('returns 503 and stores no answer when no provider is available', async () => {
      const { handle } = await setup(
        new ScriptedProvider('primary', { failAfter: 0 }),
        new ScriptedProvider('secondary', { failAfter: 0 })
      );

      const response = await handle(postJson('/chat', { message: 'hi', conversation_id: 'conv-1' }));

      expect(response.status).toBe(503);
      const body = await read(response, ErrorBody);
      expect(body.error).toBe('NoProviderAvailable');
      expect(body.details).toEqual({ attempted: ['primary', 'secondary'] });

      const history = await read(await handle(new Request(`${BASE}/conversations/conv-1`)), ConversationBody);
      expect(history.messages.map(message => message.role)).toEqual(['user']);
    });

    it('returns 503 before streaming starts when no provider is available', async () => {
      const { handle } = await setup(new ScriptedProvider('primary', { failAfter: 0 }));

      const response = await handle(postJson('/chat', { message: 'hi', stream: true }));

      expect(response.status).toBe(503);
      expect((await read(response, ErrorBody)).error).toBe('NoProviderAvailable');
    });

    it('ends a broken stream with an error event', async () => {
      const { handle } = await setup(new ScriptedProvider('primary', { fragments: ['Par', 'tial'], failAfter: 1 }));

      const response = await handle(postJson('/chat', { message: 'hi', stream: true }));
      const text = await response.text();

      expect(text.startsWith('data: Par\n\nevent: error\ndata: ')).toBe(true);
      expect(text).toContain('"error":"StreamInterrupted"');
      expect(text).not.toContain('[DONE]');
    });

    it('rejects an empty message and malformed JSON', async () => {
      const { handle } = await setup();

      const empty = await handle(postJson('/chat', { message: '   ' }));
      expect(empty.status).toBe(400);
      expect((await read(empty, ErrorBody)).error).toBe('VALIDATION_ERROR');

      const malformed = await handle(
        new Request(`${BASE}/chat`, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: '{' })
      );
      expect(malformed.status).toBe(400);
    });
  });

  describe('documents', () => {
    it('accepts an upload and lists it once ingested', async () => {
      const { app, handle } = await setup();

      const response = await handle(upload('survey.txt', sampleText(3)));
      expect(response.status).toBe(202);
      const body = await read(response, UploadBody);
      expect(body).toMatchObject({ filename: 'survey.txt', status: 'processing' });

      const doc = await app.documents.whenIngested(body.document_id);
      const list = await read(await handle(new Request(`${BASE}/documents`)), z.array(DocumentView));
      expect(list).toHaveLength(1);
      expect(list[0]).toMatchObject({
        id: body.document_id,
        filename: 'survey.txt',
        status: 'ready',
        chunk_count: doc.chunk_count,
        stored_filename: `${body.document_id}_survey.txt`,
      });
    });

    it('rejects unsupported formats with 415', async () => {
      const { handle } = await setup();

      const response = await handle(upload('slides.pptx', 'binary', 'application/octet-stream'));

      expect(response.status).toBe(415);
      expect((await read(response, ErrorBody)).error).toBe('UnsupportedFormat');
    });

    it('rejects a form without a file', async () => {
      const { handle } = await setup();
      const form = new FormData();
      form.append('note', 'no file here');

      const response = await handle(new Request(`${BASE}/upload`, { method: 'POST', body: form }));

      expect(response.status).toBe(400);
    });

    it('deletes a document and its chunks', async () => {
      const { app, handle } = await setup();
      const uploaded = await read(await handle(upload('survey.txt', sampleText(3))), UploadBody);
      const doc = await app.documents.whenIngested(uploaded.document_id);

      const response = await handle(new Request(`${BASE}/documents/${doc.id}`, { method: 'DELETE' }));

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        message: 'Document deleted successfully',
        document_id: doc.id,
        chunks_removed: doc.chunk_count,
      });
      expect(app.index.size).toBe(0);

      const again = await handle(new Request(`${BASE}/documents/${doc.id}`, { method: 'DELETE' }));
      expect(again.status).toBe(404);
    });
  });

  describe('conversations', () => {
    it('returns 404 for an unknown conversation', async () => {
      const { handle } = await setup();

      const response = await handle(new Request(`${BASE}/conversations/missing`));

      expect(response.status).toBe(404);
      expect((await read(response, ErrorBody)).error).toBe('NOT_FOUND');
    });

    it('deletes a conversation', async () => {
      const { handle } = await setup();
      await handle(postJson('/chat', { message: 'hi', conversation_id: 'conv-1' }));

      const response = await handle(new Request(`${BASE}/conversations/conv-1`, { method: 'DELETE' }));
      expect(response.status).toBe(200);

      const gone = await handle(new Request(`${BASE}/conversations/conv-1`));
      expect(gone.status).toBe(404);
    });

    it('validates paging parameters', async () => {
      const { handle } = await setup();

      const response = await handle(new Request(`${BASE}/conversations?limit=500`));

      expect(response.status).toBe(400);
    });
  });

  describe('GET /health', () => {
    it('reports provider availability and index size', async () => {
      const { handle } = await setup(
        new ScriptedProvider('primary', { healthy: false }),
        new ScriptedProvider('secondary', { healthy: true })
      );

      const response = await handle(new Request(`${BASE}/health`));
      const body = await read(response, HealthBody);

      expect(body.status).toBe('healthy');
      expect(body.services.embeddings).toBe('hash:feature-hash-v1');
      expect(body.services.providers.map(provider => [provider.name, provider.available])).toEqual([
        ['primary', false],
        ['secondary', true],
      ]);
      expect(body.index).toEqual({ chunks: 0, documents: 0 });
    });
  });

  describe('routing', () => {
    it('returns 404 for unknown paths and 405 for the wrong method', async () => {
      const { handle } = await setup();

      const missing = await handle(new Request(`${BASE}/nowhere`));
      expect(missing.status).toBe(404);

      const wrongMethod = await handle(new Request(`${BASE}/chat`));
      expect(wrongMethod.status).toBe(405);
      expect(wrongMethod.headers.get('allow')).toBe('POST');
    });

    it('tags every response with a request id and CORS headers', async () => {
      const { handle } = await setup();

      const response = await handle(new Request(`${BASE}/`));

      expect(response.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
      expect(response.headers.get('access-control-allow-origin')).toBe('*');
      expect((await read(response, z.object({ name: z.string() }))).name).toBe('ragrelay');
    });
  });
});
