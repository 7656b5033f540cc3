import type Database from 'better-sqlite3';
import { z } from 'zod';
import { DatabaseError, errorMessage } from './errors.js';
import { Logger, logger as rootLogger } from './logger.js';

interface Migration {
  version: number;
  name: string;
  up: (db: Database.Database) => void;
  down?: (db: Database.Database) => void;
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'documents_and_chunks',
    up: db => {
      db.exec(`
        CREATE TABLE documents (
          id TEXT PRIMARY KEY,
          filename TEXT NOT NULL,
          stored_path TEXT NOT NULL,
          content_type TEXT,
          size_bytes INTEGER NOT NULL,
          status TEXT NOT NULL CHECK (status IN ('processing', 'ready', 'failed')),
          chunk_count INTEGER NOT NULL DEFAULT 0,
          last_error TEXT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL,
          ingested_at TEXT
        );

        CREATE TABLE chunks (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          document_id TEXT NOT NULL,
          chunk_index INTEGER NOT NULL,
          start_position INTEGER NOT NULL,
          end_position INTEGER NOT NULL,
          text TEXT NOT NULL,
          token_count INTEGER NOT NULL,
          created_at TEXT NOT NULL,
          FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE,
          UNIQUE (document_id, chunk_index)
        );

        CREATE TABLE embeddings (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          chunk_id INTEGER NOT NULL UNIQUE,
          embedding BLOB NOT NULL,
          model_used TEXT NOT NULL,
          embedding_dimension INTEGER NOT NULL,
          created_at TEXT NOT NULL,
          FOREIGN KEY (chunk_id) REFERENCES chunks(id) ON DELETE CASCADE
        );

        CREATE INDEX idx_documents_status ON documents(status);
        CREATE INDEX idx_chunks_document ON chunks(document_id);
      `);
    },
    down: db => {
      db.exec(`
        DROP TABLE IF EXISTS embeddings;
        DROP TABLE IF EXISTS chunks;
        DROP TABLE IF EXISTS documents;
      `);
    },
  },
  {
    version: 2,
    name: 'conversations',
    up: db => {
      db.exec(`
        CREATE TABLE conversations (
          id TEXT PRIMARY KEY,
          title TEXT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE messages (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          conversation_id TEXT NOT NULL,
          role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
          content TEXT NOT NULL,
          status TEXT NOT NULL DEFAULT 'complete' CHECK (status IN ('complete', 'incomplete')),
          sources TEXT NOT NULL DEFAULT '[]',
          created_at TEXT NOT NULL,
          FOREIGN KEY (conversation_id) REFERENCES conversations(id) ON DELETE CASCADE
        );

        CREATE INDEX idx_messages_conversation ON messages(conversation_id, id);
        CREATE INDEX idx_conversations_updated ON conversations(updated_at);
      `);
    },
    down: db => {
      db.exec(`
        DROP TABLE IF EXISTS messages;
        DROP TABLE IF EXISTS conversations;
      `);
    },
  },
];

const VersionRowSchema = z.object({ version: z.number().nullable() });

export class MigrationManager {
  private migrations: Migration[];
  private log: Logger;

  constructor(private db: Database.Database, migrations: Migration[] = MIGRATIONS, log: Logger = rootLogger) {
    this.migrations = [...migrations].sort((a, b) => a.version - b.version);
    this.log = log.child({ component: 'migrations' });
  }

  /**
   * Get current schema version
   */
  getCurrentVersion(): number {
    try {
      this.ensureMigrationsTable();
      const row = VersionRowSchema.parse(this.db.prepare('SELECT MAX(version) AS version FROM migrations').get());
      return row.version ?? 0;
    } catch (error) {
      throw new DatabaseError(`Failed to get current version: ${errorMessage(error)}`);
    }
  }

  getLatestVersion(): number {
    return Math.max(0, ...this.migrations.map(m => m.version));
  }

  needsMigration(): boolean {
    return this.getCurrentVersion() < this.getLatestVersion();
  }

  /**
   * Run pending migrations in a single transaction
   */
  migrate(): void {
    const currentVersion = this.getCurrentVersion();
    const pending = this.migrations.filter(m => m.version > currentVersion);
    if (pending.length === 0) {
      return;
    }

    try {
      const record = this.db.prepare('INSERT INTO migrations (version, name, applied_at) VALUES (?, ?, ?)');
      this.db.transaction(() => {
        for (const migration of pending) {
          this.log.info('migration.apply', { version: migration.version, name: migration.name });
          migration.up(this.db);
          record.run(migration.version, migration.name, new Date().toISOString());
        }
      })();
    } catch (error) {
      throw new DatabaseError(`Migration failed: ${errorMessage(error)}`);
    }

    this.log.info('migration.done', { version: this.getCurrentVersion() });
  }

  /**
   * Roll back to `targetVersion` using each migration's `down` step
   */
  rollback(targetVersion: number): void {
    const currentVersion = this.getCurrentVersion();
    if (targetVersion >= currentVersion) {
      throw new DatabaseError('Target version must be lower than current version');
    }

    const toRollback = this.migrations
      .filter(m => m.version > targetVersion && m.version <= currentVersion)
      .reverse();

    try {
      const remove = this.db.prepare('DELETE FROM migrations WHERE version = ?');
      this.db.transaction(() => {
        for (const migration of toRollback) {
          if (!migration.down) {
            throw new DatabaseError(`Migration ${migration.version} cannot be rolled back`);
          }
          this.log.info('migration.rollback', { version: migration.version, name: migration.name });
          migration.down(this.db);
          remove.run(migration.version);
        }
      })();
    } catch (error) {
      throw new DatabaseError(`Rollback failed: ${errorMessage(error)}`);
    }
  }

  private ensureMigrationsTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL
      )
    `);
  }
}
