import { toErrorBody } from './responses.js';

export const DONE_MARKER = '[DONE]';

export const SSE_HEADERS: Record<string, string> = {
  'Content-Type': 'text/event-stream; charset=utf-8',
  'Cache-Control': 'no-store, no-transform',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
};

/**
 * One SSE event. Multi-line data is split over several `data:` lines, which clients join
 * back with `\n`.
 */
export function formatEvent(data: string, event?: string): string {
  const lines = data.split('\n').map(line => `data: ${line}`);
  return `${event ? `event: ${event}\n` : ''}${lines.join('\n')}\n\n`;
}

/**
 * Stream `fragments` as `data:` events followed by `data: [DONE]`. A failure is sent as an
 * `error` event instead of the terminator. Cancelling the response stops the source.
 */
export function sseResponse(fragments: AsyncIterable<string>, headers: Record<string, string> = {}): Response {
  const encoder = new TextEncoder();
  const iterator = fragments[Symbol.asyncIterator]();

  const stream = new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const next = await iterator.next();
        if (next.done) {
          controller.enqueue(encoder.encode(formatEvent(DONE_MARKER)));
          controller.close();
          return;
        }
        controller.enqueue(encoder.encode(formatEvent(next.value)));
      } catch (error) {
        const { body } = toErrorBody(error);
        controller.enqueue(encoder.encode(formatEvent(JSON.stringify(body), 'error')));
        controller.close();
      }
    },
    async cancel() {
      await iterator.return?.();
    },
  });

  return new Response(stream, { headers: { ...SSE_HEADERS, ...headers } });
}
