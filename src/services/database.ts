import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { DatabaseError, errorMessage } from '../utils/errors.js';
import { MigrationManager } from '../utils/migrations.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';
import { Chunk, Document, DocumentStatus, NewChunk } from '../types/document.js';
import { Conversation, Message, NewMessage } from '../types/conversation.js';
import { IndexEntry } from '../types/search.js';

const DocumentRowSchema = z.object({
  id: z.string(),
  filename: z.string(),
  stored_path: z.string(),
  content_type: z.string().nullable(),
  size_bytes: z.number(),
  status: z.enum(['processing', 'ready', 'failed']),
  chunk_count: z.number(),
  last_error: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  ingested_at: z.string().nullable(),
});

const ChunkRowSchema = z.object({
  id: z.number(),
  document_id: z.string(),
  chunk_index: z.number(),
  start_position: z.number(),
  end_position: z.number(),
  text: z.string(),
  token_count: z.number(),
  created_at: z.string(),
});

const ChunkWithFilenameRowSchema = ChunkRowSchema.extend({
  filename: z.string(),
  document_status: z.enum(['processing', 'ready', 'failed']),
});

const EmbeddingRowSchema = z.object({
  chunk_id: z.number(),
  document_id: z.string(),
  embedding: z.instanceof(Buffer),
  embedding_dimension: z.number(),
});

const ConversationRowSchema = z.object({
  id: z.string(),
  title: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

const MessageRowSchema = z.object({
  id: z.number(),
  conversation_id: z.string(),
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  status: z.enum(['complete', 'incomplete']),
  sources: z.string(),
  created_at: z.string(),
});

const SourcesSchema = z.array(z.number().int());
const CountRowSchema = z.object({ count: z.number() });

export type NewDocument = Pick<Document, 'id' | 'filename' | 'stored_path' | 'content_type' | 'size_bytes'>;

export type DocumentUpdate = Partial<Pick<Document, 'status' | 'chunk_count' | 'last_error' | 'ingested_at'>>;

export type ChunkWithDocument = Chunk & { filename: string; document_status: DocumentStatus };

const DOCUMENT_UPDATE_COLUMNS = ['status', 'chunk_count', 'last_error', 'ingested_at'] as const;

export function encodeVector(vector: number[]): Buffer {
  return Buffer.from(new Float32Array(vector).buffer);
}

export function decodeVector(blob: Buffer): number[] {
  // Copy first: a pooled Buffer's byteOffset is not necessarily 4-byte aligned.
  const bytes = Uint8Array.from(blob);
  return Array.from(new Float32Array(bytes.buffer, 0, Math.floor(bytes.byteLength / 4)));
}

function now(): string {
  return new Date().toISOString();
}

/**
 * SQLite persistence for documents, chunks, embeddings and conversations.
 * Pass `':memory:'` for a throwaway database.
 */
export class DatabaseService {
  private db: Database.Database | null = null;
  private dbPath: string;
  private log: Logger;

  constructor(dbPath: string, log: Logger = rootLogger) {
    this.dbPath = dbPath;
    this.log = log.child({ component: 'database' });
  }

  /**
   * Open the connection and bring the schema up to date
   */
  initialize(): void {
    if (this.db) return;

    try {
      if (this.dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }
      this.db = new Database(this.dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('foreign_keys = ON');
    } catch (error) {
      throw new DatabaseError(`Failed to initialize database: ${errorMessage(error)}`);
    }

    new MigrationManager(this.db, undefined, this.log).migrate();
    this.log.debug('database.ready', { path: this.dbPath });
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  getDb(): Database.Database {
    if (!this.db) {
      throw new DatabaseError('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  isInitialized(): boolean {
    return this.db !== null;
  }

  transaction<T>(fn: () => T): T {
    return this.getDb().transaction(fn)();
  }

  // Documents

  insertDocument(doc: NewDocument): Document {
    const timestamp = now();
    this.run('insert document', () =>
      this.getDb()
        .prepare(`
          INSERT INTO documents (id, filename, stored_path, content_type, size_bytes, status, chunk_count, created_at, updated_at)
          VALUES (?, ?, ?, ?, ?, 'processing', 0, ?, ?)
        `)
        .run(doc.id, doc.filename, doc.stored_path, doc.content_type, doc.size_bytes, timestamp, timestamp)
    );
    return this.requireDocument(doc.id);
  }

  getDocument(id: string): Document | null {
    const row = this.run('get document', () => this.getDb().prepare('SELECT * FROM documents WHERE id = ?').get(id));
    return row === undefined ? null : DocumentRowSchema.parse(row);
  }

  listDocuments(status?: DocumentStatus): Document[] {
    const rows = this.run('list documents', () =>
      status
        ? this.getDb().prepare('SELECT * FROM documents WHERE status = ? ORDER BY created_at DESC, id').all(status)
        : this.getDb().prepare('SELECT * FROM documents ORDER BY created_at DESC, id').all()
    );
    return z.array(DocumentRowSchema).parse(rows);
  }

  updateDocument(id: string, updates: DocumentUpdate): Document | null {
    const columns = DOCUMENT_UPDATE_COLUMNS.filter(column => updates[column] !== undefined);
    if (columns.length > 0) {
      const assignments = columns.map(column => `${column} = ?`).join(', ');
      const values = columns.map(column => updates[column] ?? null);
      this.run('update document', () =>
        this.getDb()
          .prepare(`UPDATE documents SET ${assignments}, updated_at = ? WHERE id = ?`)
          .run(...values, now(), id)
      );
    }
    return this.getDocument(id);
  }

  /**
   * Delete a document; chunks and embeddings go with it through the foreign keys.
   */
  deleteDocument(id: string): boolean {
    const result = this.run('delete document', () => this.getDb().prepare('DELETE FROM documents WHERE id = ?').run(id));
    return result.changes > 0;
  }

  // Chunks and embeddings

  /**
   * Replace every chunk of a document, embeddings included, in one transaction.
   */
  replaceChunks(documentId: string, chunks: NewChunk[], modelUsed: string): Chunk[] {
    const db = this.getDb();
    const timestamp = now();

    return this.run('store chunks', () => {
      const insertChunk = db.prepare(`
        INSERT INTO chunks (document_id, chunk_index, start_position, end_position, text, token_count, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `);
      const insertEmbedding = db.prepare(`
        INSERT INTO embeddings (chunk_id, embedding, model_used, embedding_dimension, created_at)
        VALUES (?, ?, ?, ?, ?)
      `);

      return db.transaction(() => {
        db.prepare('DELETE FROM chunks WHERE document_id = ?').run(documentId);
        for (const chunk of chunks) {
          const result = insertChunk.run(
            documentId,
            chunk.chunk_index,
            chunk.start_position,
            chunk.end_position,
            chunk.text,
            chunk.token_count,
            timestamp
          );
          insertEmbedding.run(result.lastInsertRowid, encodeVector(chunk.embedding), modelUsed, chunk.embedding.length, timestamp);
        }
        return this.getChunksByDocument(documentId);
      })();
    });
  }

  deleteChunksByDocument(documentId: string): number {
    const result = this.run('delete chunks', () =>
      this.getDb().prepare('DELETE FROM chunks WHERE document_id = ?').run(documentId)
    );
    return result.changes;
  }

  getChunksByDocument(documentId: string): Chunk[] {
    const rows = this.run('get chunks', () =>
      this.getDb().prepare('SELECT * FROM chunks WHERE document_id = ? ORDER BY chunk_index').all(documentId)
    );
    return z.array(ChunkRowSchema).parse(rows);
  }

  countChunks(documentId: string): number {
    const row = this.run('count chunks', () =>
      this.getDb().prepare('SELECT COUNT(*) AS count FROM chunks WHERE document_id = ?').get(documentId)
    );
    return CountRowSchema.parse(row).count;
  }

  getChunksByIds(ids: number[]): ChunkWithDocument[] {
    if (ids.length === 0) return [];

    const placeholders = ids.map(() => '?').join(', ');
    const rows = this.run('get chunks by id', () =>
      this.getDb()
        .prepare(`
          SELECT c.*, d.filename AS filename, d.status AS document_status
          FROM chunks c
          JOIN documents d ON d.id = c.document_id
          WHERE c.id IN (${placeholders})
        `)
        .all(...ids)
    );
    return z.array(ChunkWithFilenameRowSchema).parse(rows);
  }

  /**
   * Persisted vectors of every `ready` document, in chunk id order.
   */
  loadIndexEntries(): Array<IndexEntry & { dimension: number }> {
    const rows = this.run('load embeddings', () =>
      this.getDb()
        .prepare(`
          SELECT e.chunk_id, c.document_id, e.embedding, e.embedding_dimension
          FROM embeddings e
          JOIN chunks c ON c.id = e.chunk_id
          JOIN documents d ON d.id = c.document_id
          WHERE d.status = 'ready'
          ORDER BY e.chunk_id
        `)
        .all()
    );

    return z.array(EmbeddingRowSchema).parse(rows).map(row => ({
      chunkId: row.chunk_id,
      documentId: row.document_id,
      vector: decodeVector(row.embedding),
      dimension: row.embedding_dimension,
    }));
  }

  // Conversations

  insertConversation(id: string, title: string | null): Conversation {
    const timestamp = now();
    this.run('insert conversation', () =>
      this.getDb()
        .prepare('INSERT INTO conversations (id, title, created_at, updated_at) VALUES (?, ?, ?, ?)')
        .run(id, title, timestamp, timestamp)
    );
    return this.requireConversation(id);
  }

  getConversation(id: string): Conversation | null {
    const row = this.run('get conversation', () =>
      this.getDb().prepare('SELECT * FROM conversations WHERE id = ?').get(id)
    );
    return row === undefined ? null : ConversationRowSchema.parse(row);
  }

  listConversations(limit: number, offset: number): Conversation[] {
    const rows = this.run('list conversations', () =>
      this.getDb()
        .prepare('SELECT * FROM conversations ORDER BY updated_at DESC, id LIMIT ? OFFSET ?')
        .all(limit, offset)
    );
    return z.array(ConversationRowSchema).parse(rows);
  }

  deleteConversation(id: string): boolean {
    const result = this.run('delete conversation', () =>
      this.getDb().prepare('DELETE FROM conversations WHERE id = ?').run(id)
    );
    return result.changes > 0;
  }

  /**
   * Append a message and bump the conversation's `updated_at` together.
   */
  insertMessage(conversationId: string, message: NewMessage): Message {
    const db = this.getDb();
    const timestamp = now();

    const id = this.run('insert message', () =>
      db.transaction(() => {
        const result = db
          .prepare(`
            INSERT INTO messages (conversation_id, role, content, status, sources, created_at)
            VALUES (?, ?, ?, ?, ?, ?)
          `)
          .run(
            conversationId,
            message.role,
            message.content,
            message.status ?? 'complete',
            JSON.stringify(message.sources ?? []),
            timestamp
          );
        db.prepare('UPDATE conversations SET updated_at = ? WHERE id = ?').run(timestamp, conversationId);
        return result.lastInsertRowid;
      })()
    );

    const row = this.run('get message', () => db.prepare('SELECT * FROM messages WHERE id = ?').get(id));
    return this.toMessage(MessageRowSchema.parse(row));
  }

  getMessages(conversationId: string): Message[] {
    const rows = this.run('get messages', () =>
      this.getDb().prepare('SELECT * FROM messages WHERE conversation_id = ? ORDER BY id').all(conversationId)
    );
    return z.array(MessageRowSchema).parse(rows).map(row => this.toMessage(row));
  }

  /**
   * The most recent `limit` messages, oldest first.
   */
  getRecentMessages(conversationId: string, limit: number): Message[] {
    const rows = this.run('get recent messages', () =>
      this.getDb()
        .prepare('SELECT * FROM (SELECT * FROM messages WHERE conversation_id = ? ORDER BY id DESC LIMIT ?) ORDER BY id')
        .all(conversationId, limit)
    );
    return z.array(MessageRowSchema).parse(rows).map(row => this.toMessage(row));
  }

  private toMessage(row: z.infer<typeof MessageRowSchema>): Message {
    const sources = SourcesSchema.safeParse(JSON.parse(row.sources));
    if (!sources.success) {
      this.log.warn('message.invalid_sources', { messageId: row.id });
    }
    return { ...row, sources: sources.success ? sources.data : [] };
  }

  private requireDocument(id: string): Document {
    const doc = this.getDocument(id);
    if (!doc) throw new DatabaseError(`Document ${id} was not stored`);
    return doc;
  }

  private requireConversation(id: string): Conversation {
    const conversation = this.getConversation(id);
    if (!conversation) throw new DatabaseError(`Conversation ${id} was not stored`);
    return conversation;
  }

  private run<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof DatabaseError) throw error;
      throw new DatabaseError(`Failed to ${action}: ${errorMessage(error)}`);
    }
  }
}
