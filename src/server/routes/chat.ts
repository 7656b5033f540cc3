import { z } from 'zod';
import { RouteContext } from '../types.js';
import { json, parseBody } from '../responses.js';
import { sseResponse } from '../sse.js';
import { RetrievedChunk } from '../../types/search.js';
import { TextProcessor } from '../../utils/text-processing.js';

const ChatBodySchema = z.object({
  message: z.string({ required_error: 'message is required' }).trim().min(1, 'message cannot be empty'),
  conversation_id: z.string().trim().min(1).nullish(),
  document_ids: z.array(z.string().min(1)).nullish(),
  stream: z.boolean().default(false),
});

export function toSourceView(chunk: RetrievedChunk) {
  return {
    chunk_id: chunk.chunkId,
    document_id: chunk.documentId,
    filename: chunk.filename,
    chunk_index: chunk.chunkIndex,
    score: Number(chunk.score.toFixed(4)),
    preview: TextProcessor.truncate(chunk.text, 200),
  };
}

/**
 * POST /chat
 */
export async function POST(request: Request, { app }: RouteContext): Promise<Response> {
  const body = await parseBody(request, ChatBodySchema);
  const chatRequest = {
    message: body.message,
    conversationId: body.conversation_id ?? undefined,
    documentIds: body.document_ids ?? undefined,
  };

  if (!body.stream) {
    const result = await app.chat.respond(chatRequest, { signal: request.signal });
    return json({
      conversation_id: result.conversationId,
      response: result.response,
      sources: result.sources.map(toSourceView),
      timestamp: result.message?.created_at ?? new Date().toISOString(),
    });
  }

  const chat = app.chat.chat(chatRequest, { signal: request.signal });
  const iterator = chat.fragments[Symbol.asyncIterator]();

  // Wait for the first fragment so failures before generation starts get a real status code.
  const first = await iterator.next().catch(async (error: unknown) => {
    await chat.done;
    throw error;
  });

  async function* fragments(): AsyncGenerator<string> {
    try {
      if (first.done) return;
      yield first.value;
      while (true) {
        const next = await iterator.next();
        if (next.done) return;
        yield next.value;
      }
    } finally {
      await iterator.return?.();
    }
  }

  return sseResponse(fragments(), { 'X-Conversation-Id': chat.conversationId });
}
