import { EventEmitter } from 'events';
import http from 'http';
import { Logger, logger as rootLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export type FetchHandler = (request: Request) => Promise<Response>;

export interface ServerOptions {
  host: string;
  port: number;
  logger?: Logger;
}

export interface RunningServer {
  url: string;
  server: http.Server;
  close(): Promise<void>;
}

async function readBody(req: http.IncomingMessage): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

function toRequest(req: http.IncomingMessage, body: Buffer, signal: AbortSignal, origin: string): Request {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      value.forEach(item => headers.append(name, item));
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }

  const method = req.method ?? 'GET';
  const hasBody = method !== 'GET' && method !== 'HEAD' && body.byteLength > 0;
  return new Request(new URL(req.url ?? '/', origin), {
    method,
    headers,
    body: hasBody ? body : undefined,
    signal,
  });
}

async function writeResponse(res: http.ServerResponse, response: Response, log: Logger): Promise<void> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  res.writeHead(response.status, headers);

  if (!response.body) {
    res.end();
    return;
  }

  const reader = response.body.getReader();
  const cancel = () => {
    reader.cancel().catch((error: unknown) => log.debug('http.cancel_failed', { error: errorMessage(error) }));
  };
  res.on('close', cancel);

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      if (!res.write(value) && (await waitForDrain(res)) === 'close') {
        break;
      }
    }
  } finally {
    res.off('close', cancel);
    res.end();
  }
}

/**
 * Resolves on the next `drain`, or on `close` when the client goes away while a write is
 * still buffered.
 */
export function waitForDrain(res: EventEmitter): Promise<'drain' | 'close'> {
  return new Promise(resolve => {
    const onDrain = () => settle('drain');
    const onClose = () => settle('close');
    const settle = (outcome: 'drain' | 'close') => {
      res.off('drain', onDrain);
      res.off('close', onClose);
      resolve(outcome);
    };
    res.once('drain', onDrain);
    res.once('close', onClose);
  });
}

/**
 * Serve a fetch-style handler over node:http. Request bodies are buffered; response bodies
 * are streamed, and a client disconnect aborts `request.signal` and cancels the body.
 */
export function startServer(handler: FetchHandler, options: ServerOptions): Promise<RunningServer> {
  const log = (options.logger ?? rootLogger).child({ component: 'http' });

  const server = http.createServer((req, res) => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    const handle = async () => {
      const origin = `http://${req.headers.host ?? `${options.host}:${options.port}`}`;
      const body = await readBody(req);
      const response = await handler(toRequest(req, body, controller.signal, origin));
      await writeResponse(res, response, log);
    };

    void handle().catch((error: unknown) => {
      log.error('http.unhandled', { error: errorMessage(error) });
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ error: 'INTERNAL_ERROR', message: 'Internal server error' }));
      } else {
        res.destroy();
      }
    });
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : options.port;
      const url = `http://${options.host}:${port}`;
      log.info('http.listening', { url });

      resolve({
        url,
        server,
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            server.close(error => (error ? rejectClose(error) : resolveClose()));
            server.closeAllConnections();
          }),
      });
    });
  });
}
