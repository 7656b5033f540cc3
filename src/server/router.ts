import { randomUUID } from 'crypto';
import type { AppContext } from '../app.js';
import { RouteHandler } from './types.js';
import { errorResponse, json, toErrorBody } from './responses.js';
import * as chat from './routes/chat.js';
import * as upload from './routes/upload.js';
import * as documents from './routes/documents.js';
import * as conversations from './routes/conversations.js';
import * as health from './routes/health.js';

type Method = 'GET' | 'POST' | 'DELETE';

interface Route {
  method: Method;
  pattern: string;
  segments: string[];
  handler: RouteHandler;
}

const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
  'Access-Control-Expose-Headers': 'X-Request-Id, X-Runtime-MS, X-Conversation-Id',
};

function route(method: Method, pattern: string, handler: RouteHandler): Route {
  return { method, pattern, segments: split(pattern), handler };
}

function split(pathname: string): string[] {
  return pathname.split('/').filter(Boolean);
}

export const ROUTES: Route[] = [
  route('GET', '/', health.root),
  route('GET', '/health', health.GET),
  route('POST', '/chat', chat.POST),
  route('POST', '/upload', upload.POST),
  route('GET', '/documents', documents.list),
  route('GET', '/documents/:id', documents.get),
  route('DELETE', '/documents/:id', documents.remove),
  route('POST', '/documents/:id/reingest', documents.reingest),
  route('GET', '/conversations', conversations.list),
  route('GET', '/conversations/:id', conversations.get),
  route('DELETE', '/conversations/:id', conversations.remove),
];

function match(route: Route, segments: string[]): Record<string, string> | undefined {
  if (route.segments.length !== segments.length) return undefined;

  const params: Record<string, string> = {};
  for (let i = 0; i < segments.length; i++) {
    const expected = route.segments[i] ?? '';
    const actual = segments[i] ?? '';
    if (expected.startsWith(':')) {
      params[expected.slice(1)] = safeDecode(actual);
    } else if (expected !== actual) {
      return undefined;
    }
  }
  return params;
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Fetch-style handler for the whole API: routes the request, maps thrown errors to JSON
 * error responses and logs one line per request.
 */
export function createHandler(app: AppContext): (request: Request) => Promise<Response> {
  const log = app.logger.child({ component: 'http' });

  return async (request: Request): Promise<Response> => {
    const requestId = randomUUID();
    const startedAt = Date.now();
    const url = new URL(request.url);
    const segments = split(url.pathname);

    const finish = (response: Response, routePattern?: string): Response => {
      const headers = new Headers(response.headers);
      Object.entries(CORS_HEADERS).forEach(([key, value]) => headers.set(key, value));
      headers.set('X-Request-Id', requestId);
      headers.set('X-Runtime-MS', String(Date.now() - startedAt));

      log.info('http.request', {
        requestId,
        method: request.method,
        path: url.pathname,
        route: routePattern ?? null,
        status: response.status,
        durationMs: Date.now() - startedAt,
      });
      return new Response(response.body, { status: response.status, headers });
    };

    if (request.method === 'OPTIONS') {
      return finish(new Response(null, { status: 204 }));
    }

    const candidates = ROUTES.flatMap(r => {
      const params = match(r, segments);
      return params ? [{ route: r, params }] : [];
    });
    if (candidates.length === 0) {
      return finish(json({ error: 'NOT_FOUND', message: `No route for ${url.pathname}` }, 404));
    }

    const matched = candidates.find(candidate => candidate.route.method === request.method);
    if (!matched) {
      const allow = candidates.map(candidate => candidate.route.method).join(', ');
      return finish(
        json({ error: 'METHOD_NOT_ALLOWED', message: `${request.method} is not allowed` }, 405, { Allow: allow })
      );
    }

    try {
      const response = await matched.route.handler(request, { app, params: matched.params, url });
      return finish(response, matched.route.pattern);
    } catch (error) {
      const { status } = toErrorBody(error);
      if (status >= 500) {
        log.error('http.error', { requestId, path: url.pathname, error });
      }
      return finish(errorResponse(error), matched.route.pattern);
    }
  };
}
