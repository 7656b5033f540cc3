import { EmbeddingProvider } from '../types/provider.js';
import { RetrievalOptions, RetrievedChunk } from '../types/search.js';
import { DatabaseService } from './database.js';
import { VectorIndex } from './vector-index.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';

export interface RetrieverDefaults {
  k: number;
  minScore: number;
}

export class Retriever {
  private log: Logger;

  constructor(
    private embeddings: EmbeddingProvider,
    private index: VectorIndex,
    private db: DatabaseService,
    private defaults: RetrieverDefaults = { k: 3, minScore: 0 },
    log: Logger = rootLogger
  ) {
    this.log = log.child({ component: 'retriever' });
  }

  /**
   * Top-k chunks for `query`. An empty or omitted `documentIds` searches every ready
   * document; an empty index gives an empty result.
   */
  async retrieve(query: string, options: RetrievalOptions = {}): Promise<RetrievedChunk[]> {
    const k = options.k ?? this.defaults.k;
    const minScore = options.minScore ?? this.defaults.minScore;
    const requested = options.documentIds && options.documentIds.length > 0 ? options.documentIds : undefined;

    if (query.trim().length === 0 || this.index.size === 0) {
      return [];
    }

    // Restrict to ready documents before the top-k cut so chunks of a document being
    // ingested cannot take the slots.
    const ready = new Set(this.db.listDocuments('ready').map(doc => doc.id));
    const filter = requested ? requested.filter(id => ready.has(id)) : [...ready];
    if (filter.length === 0) {
      return [];
    }

    const queryVector = await this.embeddings.embed(query);
    const hits = this.index.search(queryVector, k, filter).filter(hit => hit.score >= minScore);
    if (hits.length === 0) {
      return [];
    }

    const chunks = new Map(this.db.getChunksByIds(hits.map(hit => hit.chunkId)).map(chunk => [chunk.id, chunk]));
    const results: RetrievedChunk[] = [];
    for (const hit of hits) {
      const chunk = chunks.get(hit.chunkId);
      // A document deleted or re-ingested after the search started.
      if (!chunk || chunk.document_status !== 'ready') continue;
      results.push({
        chunkId: hit.chunkId,
        documentId: hit.documentId,
        filename: chunk.filename,
        chunkIndex: chunk.chunk_index,
        text: chunk.text,
        score: hit.score,
      });
    }

    this.log.debug('retrieve.done', { k, hits: hits.length, returned: results.length, documents: filter.length });
    return results;
  }
}
