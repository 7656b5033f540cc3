export interface IndexEntry {
  chunkId: number;
  documentId: string;
  vector: number[];
}

export interface IndexHit {
  chunkId: number;
  documentId: string;
  score: number;
}

export interface RetrievalOptions {
  documentIds?: string[];
  k?: number;
  minScore?: number;
}

export interface RetrievedChunk {
  chunkId: number;
  documentId: string;
  filename: string;
  chunkIndex: number;
  text: string;
  score: number;
}
