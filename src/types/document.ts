export type DocumentStatus = 'processing' | 'ready' | 'failed';

export interface Document {
  id: string;
  filename: string;
  stored_path: string;
  content_type: string | null;
  size_bytes: number;
  status: DocumentStatus;
  chunk_count: number;
  last_error: string | null;
  created_at: string;
  updated_at: string;
  ingested_at: string | null;
}

export interface Chunk {
  id: number;
  document_id: string;
  chunk_index: number;
  start_position: number;
  end_position: number;
  text: string;
  token_count: number;
  created_at: string;
}

export interface Embedding {
  id: number;
  chunk_id: number;
  embedding: Buffer;
  model_used: string;
  embedding_dimension: number;
  created_at: string;
}

export type NewChunk = Omit<Chunk, 'id' | 'document_id' | 'created_at'> & {
  embedding: number[];
};
