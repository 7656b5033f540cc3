import { RouteContext } from '../types.js';
import { json } from '../responses.js';
import { APP_NAME, APP_VERSION } from '../../constants.js';

/**
 * GET /health: liveness plus a fresh probe of every generation provider.
 */
export async function GET(_request: Request, { app }: RouteContext): Promise<Response> {
  const providers = await app.router.checkHealth();
  const anyAvailable = providers.some(provider => provider.available);

  return json({
    status: anyAvailable ? 'healthy' : 'degraded',
    services: {
      api: 'running',
      embeddings: `${app.embeddings.name}:${app.embeddings.model}`,
      providers: providers.map(provider => ({
        name: provider.name,
        available: provider.available,
        last_checked: provider.lastChecked,
        last_error: provider.lastError,
      })),
    },
    index: {
      chunks: app.index.size,
      documents: app.index.documentIds().length,
    },
  });
}

/** GET / */
export async function root(): Promise<Response> {
  return json({
    name: APP_NAME,
    version: APP_VERSION,
    endpoints: [
      'POST /chat',
      'POST /upload',
      'GET /documents',
      'GET /documents/{id}',
      'DELETE /documents/{id}',
      'POST /documents/{id}/reingest',
      'GET /conversations',
      'GET /conversations/{id}',
      'DELETE /conversations/{id}',
      'GET /health',
    ],
  });
}
