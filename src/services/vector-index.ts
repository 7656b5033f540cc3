import { IndexCorruptionError } from '../utils/errors.js';
import { Mutex } from '../utils/mutex.js';
import { IndexEntry, IndexHit } from '../types/search.js';

interface StoredVector {
  documentId: string;
  /** L2-normalised; all zeros for a zero input. */
  vector: Float32Array;
}

interface Snapshot {
  readonly vectors: ReadonlyMap<number, StoredVector>;
  readonly byDocument: ReadonlyMap<string, readonly number[]>;
  readonly dimension: number | undefined;
}

const EMPTY: Snapshot = { vectors: new Map(), byDocument: new Map(), dimension: undefined };

/**
 * In-memory cosine-similarity index over chunk vectors.
 *
 * Mutations run one at a time behind a mutex and publish a fresh immutable snapshot when they
 * finish. `search` reads whichever snapshot is current when it is called, so it never waits on
 * a writer and never sees half of a document.
 */
export class VectorIndex {
  private snapshot: Snapshot;
  private writeLock = new Mutex();

  constructor(dimension?: number) {
    this.snapshot = { ...EMPTY, dimension };
  }

  get size(): number {
    return this.snapshot.vectors.size;
  }

  get dimension(): number | undefined {
    return this.snapshot.dimension;
  }

  countByDocument(documentId: string): number {
    return this.snapshot.byDocument.get(documentId)?.length ?? 0;
  }

  documentIds(): string[] {
    return [...this.snapshot.byDocument.keys()];
  }

  has(chunkId: number): boolean {
    return this.snapshot.vectors.has(chunkId);
  }

  async upsert(chunkId: number, vector: number[], documentId: string): Promise<void> {
    await this.mutate(current => {
      const prepared = this.prepare(vector, current.dimension, documentId);
      const vectors = new Map(current.vectors);
      const byDocument = new Map(current.byDocument);

      const existing = vectors.get(chunkId);
      if (existing && existing.documentId !== documentId) {
        removeFrom(byDocument, existing.documentId, chunkId);
      }
      vectors.set(chunkId, { documentId, vector: prepared });
      const ids = byDocument.get(documentId) ?? [];
      if (!ids.includes(chunkId)) {
        byDocument.set(documentId, [...ids, chunkId]);
      }

      return { vectors, byDocument, dimension: current.dimension ?? prepared.length };
    });
  }

  /**
   * Replace every vector of `documentId` with `entries` in one step.
   */
  async upsertDocument(documentId: string, entries: Array<Pick<IndexEntry, 'chunkId' | 'vector'>>): Promise<void> {
    await this.mutate(current => {
      let dimension = current.dimension;
      const prepared = entries.map(entry => {
        const vector = this.prepare(entry.vector, dimension, documentId);
        dimension = vector.length;
        return { chunkId: entry.chunkId, vector };
      });

      const vectors = new Map(current.vectors);
      const byDocument = new Map(current.byDocument);
      for (const chunkId of byDocument.get(documentId) ?? []) {
        vectors.delete(chunkId);
      }

      for (const { chunkId, vector } of prepared) {
        const existing = vectors.get(chunkId);
        if (existing) {
          throw new IndexCorruptionError(
            `Chunk ${chunkId} is already indexed for document ${existing.documentId}`,
            documentId
          );
        }
        vectors.set(chunkId, { documentId, vector });
      }

      if (prepared.length > 0) {
        byDocument.set(documentId, prepared.map(entry => entry.chunkId));
      } else {
        byDocument.delete(documentId);
      }
      return { vectors, byDocument, dimension };
    });
  }

  /**
   * Top `k` chunks by cosine similarity, ties broken by ascending chunk id.
   * `documentIds` restricts the search; an empty list matches nothing.
   */
  search(query: number[], k: number, documentIds?: readonly string[]): IndexHit[] {
    const snapshot = this.snapshot;
    if (k <= 0 || snapshot.vectors.size === 0 || snapshot.dimension === undefined) {
      return [];
    }
    if (query.length !== snapshot.dimension) {
      throw new IndexCorruptionError(
        `Query vector has dimension ${query.length}, index expects ${snapshot.dimension}`
      );
    }

    const normalizedQuery = normalize(query);
    const candidates = documentIds
      ? documentIds.flatMap(documentId => snapshot.byDocument.get(documentId) ?? [])
      : [...snapshot.vectors.keys()];

    const hits: IndexHit[] = [];
    for (const chunkId of new Set(candidates)) {
      const stored = snapshot.vectors.get(chunkId);
      if (!stored) continue;
      hits.push({ chunkId, documentId: stored.documentId, score: dot(normalizedQuery, stored.vector) });
    }

    hits.sort((a, b) => b.score - a.score || a.chunkId - b.chunkId);
    return hits.slice(0, k);
  }

  async deleteByDocument(documentId: string): Promise<number> {
    let removed = 0;
    await this.mutate(current => {
      const ids = current.byDocument.get(documentId);
      if (!ids) return current;

      const vectors = new Map(current.vectors);
      const byDocument = new Map(current.byDocument);
      ids.forEach(chunkId => vectors.delete(chunkId));
      byDocument.delete(documentId);
      removed = ids.length;
      return { vectors, byDocument, dimension: current.dimension };
    });
    return removed;
  }

  /**
   * Replace the whole index, e.g. from persisted embeddings at start-up.
   */
  async load(entries: IndexEntry[]): Promise<void> {
    await this.mutate(current => {
      let dimension = current.dimension;
      const vectors = new Map<number, StoredVector>();
      const byDocument = new Map<string, number[]>();

      for (const entry of entries) {
        const vector = this.prepare(entry.vector, dimension, entry.documentId);
        dimension = vector.length;
        vectors.set(entry.chunkId, { documentId: entry.documentId, vector });
        const ids = byDocument.get(entry.documentId);
        if (ids) {
          ids.push(entry.chunkId);
        } else {
          byDocument.set(entry.documentId, [entry.chunkId]);
        }
      }
      return { vectors, byDocument, dimension };
    });
  }

  async clear(): Promise<void> {
    await this.mutate(current => ({ ...EMPTY, dimension: current.dimension }));
  }

  private async mutate(change: (current: Snapshot) => Snapshot): Promise<void> {
    await this.writeLock.runExclusive(() => {
      this.snapshot = change(this.snapshot);
    });
  }

  private prepare(vector: number[], dimension: number | undefined, documentId: string): Float32Array {
    if (vector.length === 0) {
      throw new IndexCorruptionError('Cannot index an empty vector', documentId);
    }
    if (dimension !== undefined && vector.length !== dimension) {
      throw new IndexCorruptionError(
        `Vector has dimension ${vector.length}, index expects ${dimension}`,
        documentId
      );
    }
    if (!vector.every(Number.isFinite)) {
      throw new IndexCorruptionError('Vector contains non-finite values', documentId);
    }
    return normalize(vector);
  }
}

function normalize(vector: number[]): Float32Array {
  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  const result = new Float32Array(vector.length);
  if (norm > 0) {
    vector.forEach((value, i) => {
      result[i] = value / norm;
    });
  }
  return result;
}

function dot(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

function removeFrom(byDocument: Map<string, readonly number[]>, documentId: string, chunkId: number): void {
  const remaining = (byDocument.get(documentId) ?? []).filter(id => id !== chunkId);
  if (remaining.length > 0) {
    byDocument.set(documentId, remaining);
  } else {
    byDocument.delete(documentId);
  }
}
