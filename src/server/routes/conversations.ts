import { RouteContext } from '../types.js';
import { json } from '../responses.js';
import { ValidationError } from '../../utils/errors.js';

function conversationId({ params }: RouteContext): string {
  return params['id'] ?? '';
}

function intParam(url: URL, name: string, fallback: number, max: number): number {
  const raw = url.searchParams.get(name);
  if (raw === null) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new ValidationError(`${name} must be an integer between 0 and ${max}`);
  }
  return value;
}

/** GET /conversations?limit&offset */
export async function list(_request: Request, { app, url }: RouteContext): Promise<Response> {
  const limit = intParam(url, 'limit', 20, 100);
  const offset = intParam(url, 'offset', 0, Number.MAX_SAFE_INTEGER);
  const conversations = app.conversations.list(limit, offset);

  return json({
    conversations: conversations.map(conversation => ({
      conversation_id: conversation.id,
      title: conversation.title,
      created_at: conversation.created_at,
      updated_at: conversation.updated_at,
    })),
    limit,
    offset,
  });
}

/** GET /conversations/:id */
export async function get(_request: Request, context: RouteContext): Promise<Response> {
  const conversation = context.app.conversations.get(conversationId(context));
  return json({
    conversation_id: conversation.id,
    title: conversation.title,
    messages: conversation.messages.map(message => ({
      id: message.id,
      role: message.role,
      content: message.content,
      status: message.status,
      sources: message.sources,
      created_at: message.created_at,
    })),
    created_at: conversation.created_at,
    updated_at: conversation.updated_at,
  });
}

/** DELETE /conversations/:id */
export async function remove(_request: Request, context: RouteContext): Promise<Response> {
  const id = conversationId(context);
  await context.app.conversations.withLock(id, () => context.app.conversations.delete(id));
  return json({ message: 'Conversation deleted successfully', conversation_id: id });
}
