import type { AppContext } from '../app.js';

export interface RouteContext {
  app: AppContext;
  params: Record<string, string>;
  url: URL;
}

export type RouteHandler = (request: Request, context: RouteContext) => Promise<Response>;
