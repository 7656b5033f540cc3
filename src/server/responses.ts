import { z } from 'zod';
import { NoProviderAvailableError, RagError, ValidationError, errorMessage } from '../utils/errors.js';

export interface ErrorBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

const NO_STORE = { 'Cache-Control': 'no-store' };

export function json(data: unknown, status: number = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json; charset=utf-8', ...NO_STORE, ...headers },
  });
}

/**
 * Body and status for an error. Errors outside the `RagError` family are reported as a
 * plain 500 without their message.
 */
export function toErrorBody(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof RagError) {
    const body: ErrorBody = { error: error.code, message: error.message };
    if (error instanceof NoProviderAvailableError) {
      body.details = { attempted: error.attempted };
    }
    return { status: error.status, body };
  }
  return { status: 500, body: { error: 'INTERNAL_ERROR', message: 'Internal server error' } };
}

export function errorResponse(error: unknown, headers: Record<string, string> = {}): Response {
  const { status, body } = toErrorBody(error);
  return json(body, status, headers);
}

/**
 * Parse a JSON request body against `schema`; malformed JSON and schema failures are
 * reported as `ValidationError`.
 */
export async function parseBody<T extends z.ZodTypeAny>(request: Request, schema: T): Promise<z.output<T>> {
  let raw: unknown;
  try {
    raw = await request.json();
  } catch (error) {
    throw new ValidationError(`Request body must be valid JSON: ${errorMessage(error)}`);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(issues.join('; '));
  }
  return result.data;
}
