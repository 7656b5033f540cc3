import path from 'path';
import { RouteContext } from '../types.js';
import { json } from '../responses.js';
import { Document } from '../../types/document.js';

export function toDocumentView(doc: Document) {
  return {
    id: doc.id,
    filename: doc.filename,
    stored_filename: path.basename(doc.stored_path),
    content_type: doc.content_type,
    size_bytes: doc.size_bytes,
    status: doc.status,
    chunk_count: doc.chunk_count,
    error: doc.last_error,
    created_at: doc.created_at,
    updated_at: doc.updated_at,
    ingested_at: doc.ingested_at,
  };
}

function documentId({ params }: RouteContext): string {
  return params['id'] ?? '';
}

/** GET /documents */
export async function list(_request: Request, { app }: RouteContext): Promise<Response> {
  return json(app.documents.list().map(toDocumentView));
}

/** GET /documents/:id */
export async function get(_request: Request, context: RouteContext): Promise<Response> {
  return json(toDocumentView(context.app.documents.get(documentId(context))));
}

/** DELETE /documents/:id */
export async function remove(_request: Request, context: RouteContext): Promise<Response> {
  const result = await context.app.documents.delete(documentId(context));
  return json({
    message: 'Document deleted successfully',
    document_id: result.documentId,
    chunks_removed: result.chunksRemoved,
  });
}

/** POST /documents/:id/reingest */
export async function reingest(_request: Request, context: RouteContext): Promise<Response> {
  const doc = await context.app.documents.reingest(documentId(context));
  return json(toDocumentView(doc), 202);
}
