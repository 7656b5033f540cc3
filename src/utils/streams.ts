/**
 * Split a byte stream into text lines. The trailing partial line is emitted once the stream ends.
 */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';
      for (const line of lines) {
        yield line.replace(/\r$/, '');
      }
    }

    buffer += decoder.decode();
    if (buffer.length > 0) {
      yield buffer.replace(/\r$/, '');
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Abort signal that fires when any of the given signals does, or after `timeoutMs`.
 */
export function combineSignals(signals: Array<AbortSignal | undefined>, timeoutMs?: number): AbortSignal {
  const active = signals.filter((signal): signal is AbortSignal => signal !== undefined);
  if (timeoutMs !== undefined) {
    active.push(AbortSignal.timeout(timeoutMs));
  }
  return active.length === 1 && active[0] ? active[0] : AbortSignal.any(active);
}

export async function safeText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '<no body>';
  }
}
