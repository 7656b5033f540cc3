import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { DatabaseService } from './database.js';
import { VectorIndex } from './vector-index.js';
import { TextChunker, ChunkingOptions, TextChunk } from '../utils/chunking.js';
import { TextProcessor } from '../utils/text-processing.js';
import { Document, NewChunk } from '../types/document.js';
import { EmbeddingProvider } from '../types/provider.js';
import {
  FileError,
  IndexCorruptionError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../utils/errors.js';
import { KeyedMutex } from '../utils/mutex.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';

export interface DocumentServiceOptions {
  chunking: ChunkingOptions;
  uploadDir: string;
  batchSize?: number;
  maxUploadBytes?: number;
}

export interface UploadInput {
  filename: string;
  content: Uint8Array;
  contentType?: string | null;
}

export interface DeleteResult {
  documentId: string;
  chunksRemoved: number;
}

/**
 * Owns a document's lifecycle: the stored upload, extraction, chunking, embedding and the
 * all-or-nothing hand-over of its chunks to the database and the vector index.
 *
 * Ingestion runs in the background after `upload`; `whenIngested` and `waitForIdle` let
 * callers await it. Embeddings are computed before any lock is taken. The commit, failure
 * rollback and delete of one document are serialised so a deleted document can never be
 * re-added to the index by an ingestion that was already running.
 */
export class DocumentService {
  private chunker: TextChunker;
  private batchSize: number;
  private maxUploadBytes: number;
  private inFlight = new Map<string, Promise<Document>>();
  private documentLocks = new KeyedMutex();
  private log: Logger;

  constructor(
    private db: DatabaseService,
    private index: VectorIndex,
    private embeddings: EmbeddingProvider,
    private options: DocumentServiceOptions,
    log: Logger = rootLogger
  ) {
    this.chunker = new TextChunker(options.chunking);
    this.batchSize = options.batchSize ?? 64;
    this.maxUploadBytes = options.maxUploadBytes ?? 25 * 1024 * 1024;
    this.log = log.child({ component: 'documents' });
  }

  /**
   * Rebuild the index from persisted embeddings and resume documents left in `processing`
   * by a previous run.
   */
  async initialize(): Promise<void> {
    const entries = this.db.loadIndexEntries();
    const stale = new Set(
      entries.filter(entry => entry.dimension !== this.embeddings.dimension).map(entry => entry.documentId)
    );

    for (const documentId of stale) {
      this.log.warn('index.dimension_mismatch', { documentId, expected: this.embeddings.dimension });
      this.db.transaction(() => {
        this.db.deleteChunksByDocument(documentId);
        this.db.updateDocument(documentId, {
          status: 'failed',
          chunk_count: 0,
          last_error: 'Embedding dimension changed; re-ingest the document',
        });
      });
    }

    await this.index.load(entries.filter(entry => !stale.has(entry.documentId)));
    this.log.info('index.loaded', { chunks: this.index.size, documents: this.index.documentIds().length });

    for (const doc of this.db.listDocuments('processing')) {
      this.log.info('ingest.resume', { documentId: doc.id, filename: doc.filename });
      this.schedule(doc.id);
    }
  }

  /**
   * Store the upload and start ingesting it. Unsupported types are rejected before anything
   * is written.
   */
  async upload(input: UploadInput): Promise<Document> {
    const filename = input.filename.trim();
    if (filename.length === 0) {
      throw new ValidationError('No filename provided');
    }
    TextProcessor.detectFormat(filename, input.contentType);

    if (input.content.byteLength === 0) {
      throw new ValidationError('Uploaded file is empty');
    }
    if (input.content.byteLength > this.maxUploadBytes) {
      throw new ValidationError(`File exceeds the ${this.maxUploadBytes} byte upload limit`);
    }

    const id = randomUUID();
    const storedPath = path.join(this.options.uploadDir, `${id}_${TextProcessor.sanitizeFilename(filename)}`);
    try {
      await fs.mkdir(this.options.uploadDir, { recursive: true });
      await fs.writeFile(storedPath, input.content);
    } catch (error) {
      throw new FileError(`Failed to store upload: ${errorMessage(error)}`);
    }

    const doc = this.db.insertDocument({
      id,
      filename,
      stored_path: storedPath,
      content_type: input.contentType ?? null,
      size_bytes: input.content.byteLength,
    });
    this.log.info('upload.stored', { documentId: id, filename, bytes: doc.size_bytes });

    this.schedule(id);
    return doc;
  }

  /**
   * Upload a file from disk and wait for its ingestion to finish.
   */
  async addFromFile(filePath: string): Promise<Document> {
    const absolutePath = path.resolve(filePath);
    let content: Buffer;
    try {
      content = await fs.readFile(absolutePath);
    } catch (error) {
      throw new FileError(`Cannot read file ${absolutePath}: ${errorMessage(error)}`);
    }

    const doc = await this.upload({ filename: path.basename(absolutePath), content });
    return this.whenIngested(doc.id);
  }

  /**
   * Resolves with the document once its current ingestion has finished, whether it ended
   * `ready` or `failed`.
   */
  async whenIngested(documentId: string): Promise<Document> {
    const task = this.inFlight.get(documentId);
    return task ? task : this.get(documentId);
  }

  async waitForIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight.values()]);
    }
  }

  isIngesting(documentId: string): boolean {
    return this.inFlight.has(documentId);
  }

  /**
   * Run the pipeline for a stored document. Failures leave the document `failed` with
   * nothing of it in the index; the returned document reflects the final status.
   */
  async ingest(documentId: string): Promise<Document> {
    const doc = this.get(documentId);
    const startedAt = Date.now();

    try {
      const content = await this.readStored(doc);
      const format = TextProcessor.detectFormat(doc.filename, doc.content_type);
      const text = await TextProcessor.extractText(content, format);
      const textChunks = this.chunker.chunk(text);
      if (textChunks.length === 0) {
        throw new ValidationError('Document contains no extractable text');
      }

      const vectors = await this.embedAll(textChunks);
      const ready = await this.commit(documentId, textChunks, vectors);
      this.log.info('ingest.ready', {
        documentId,
        chunks: ready.chunk_count,
        characters: text.length,
        durationMs: Date.now() - startedAt,
      });
      return ready;
    } catch (error) {
      return this.fail(documentId, error);
    }
  }

  async reingest(documentId: string): Promise<Document> {
    this.get(documentId);
    if (this.inFlight.has(documentId)) {
      throw new ValidationError('Document is already being ingested');
    }

    const doc = this.db.updateDocument(documentId, { status: 'processing', last_error: null });
    if (!doc) {
      throw new NotFoundError(`Document not found: ${documentId}`);
    }
    this.schedule(documentId);
    return doc;
  }

  /**
   * Remove a document, its chunks, its vectors and the stored upload.
   */
  async delete(documentId: string): Promise<DeleteResult> {
    return this.documentLocks.runExclusive(documentId, async () => {
      const doc = this.get(documentId);
      const chunksRemoved = this.db.countChunks(documentId);

      await this.index.deleteByDocument(documentId);
      this.db.deleteDocument(documentId);

      try {
        await fs.rm(doc.stored_path, { force: true });
      } catch (error) {
        this.log.warn('delete.file_failed', { documentId, path: doc.stored_path, error });
      }

      this.log.info('document.deleted', { documentId, chunksRemoved });
      return { documentId, chunksRemoved };
    });
  }

  get(documentId: string): Document {
    const doc = this.db.getDocument(documentId);
    if (!doc) {
      throw new NotFoundError(`Document not found: ${documentId}`);
    }
    return doc;
  }

  list(): Document[] {
    return this.db.listDocuments();
  }

  private schedule(documentId: string): void {
    const task = this.ingest(documentId);
    this.inFlight.set(documentId, task);

    const settle = () => {
      if (this.inFlight.get(documentId) === task) {
        this.inFlight.delete(documentId);
      }
    };

    void task.then(settle, (error: unknown) => {
      settle();
      if (error instanceof NotFoundError) {
        this.log.info('ingest.cancelled', { documentId, reason: error.message });
      } else {
        this.log.error('ingest.crashed', { documentId, error });
      }
    });
  }

  private async readStored(doc: Document): Promise<Buffer> {
    try {
      return await fs.readFile(doc.stored_path);
    } catch (error) {
      throw new FileError(`Stored upload is missing: ${errorMessage(error)}`);
    }
  }

  private async embedAll(chunks: TextChunk[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < chunks.length; i += this.batchSize) {
      const batch = chunks.slice(i, i + this.batchSize).map(chunk => chunk.text);
      vectors.push(...(await this.embeddings.embedBatch(batch)));
    }

    if (vectors.length !== chunks.length) {
      throw new IndexCorruptionError(`Expected ${chunks.length} embeddings, received ${vectors.length}`);
    }
    return vectors;
  }

  private async commit(documentId: string, textChunks: TextChunk[], vectors: number[][]): Promise<Document> {
    return this.documentLocks.runExclusive(documentId, async () => {
      if (!this.db.getDocument(documentId)) {
        throw new NotFoundError(`Document ${documentId} was deleted during ingestion`);
      }

      const newChunks: NewChunk[] = textChunks.map((chunk, i) => ({
        chunk_index: chunk.index,
        start_position: chunk.startPosition,
        end_position: chunk.endPosition,
        text: chunk.text,
        token_count: chunk.tokenCount,
        embedding: vectors[i] ?? [],
      }));

      const stored = this.db.replaceChunks(documentId, newChunks, this.embeddings.model);
      await this.index.upsertDocument(
        documentId,
        stored.map(chunk => ({ chunkId: chunk.id, vector: vectors[chunk.chunk_index] ?? [] }))
      );

      const ready = this.db.updateDocument(documentId, {
        status: 'ready',
        chunk_count: stored.length,
        last_error: null,
        ingested_at: new Date().toISOString(),
      });
      if (!ready) {
        throw new NotFoundError(`Document ${documentId} was deleted during ingestion`);
      }
      return ready;
    });
  }

  private async fail(documentId: string, error: unknown): Promise<Document> {
    if (error instanceof NotFoundError) {
      throw error;
    }

    return this.documentLocks.runExclusive(documentId, async () => {
      await this.index.deleteByDocument(documentId);
      const failed = this.db.transaction(() => {
        this.db.deleteChunksByDocument(documentId);
        return this.db.updateDocument(documentId, {
          status: 'failed',
          chunk_count: 0,
          last_error: errorMessage(error),
        });
      });
      if (!failed) {
        throw new NotFoundError(`Document ${documentId} was deleted during ingestion`);
      }

      this.log.error('ingest.failed', { documentId, error });
      return failed;
    });
  }
}
