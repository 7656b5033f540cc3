import { RouteContext } from '../types.js';
import { json } from '../responses.js';
import { ValidationError } from '../../utils/errors.js';

/**
 * POST /upload: multipart form with a `file` field. Ingestion continues in the background.
 */
export async function POST(request: Request, { app }: RouteContext): Promise<Response> {
  let form: Awaited<ReturnType<Request['formData']>>;
  try {
    form = await request.formData();
  } catch {
    throw new ValidationError('Expected a multipart/form-data body');
  }

  const file = form.get('file');
  if (file === null || typeof file === 'string') {
    throw new ValidationError('Missing file field');
  }

  const doc = await app.documents.upload({
    filename: file.name,
    content: new Uint8Array(await file.arrayBuffer()),
    contentType: file.type || null,
  });

  return json({ document_id: doc.id, filename: doc.filename, status: doc.status }, 202);
}
