export interface QaRow {
  copyright: string;
  url: string;
  question: string;
  answer: string;
}

export interface ChunkInfo {
  chunk_method: string;
  chunk_index: number;
  is_question: boolean;
  total_answer_chunks?: number;
  original_length?: number;
}

// Persisted as JSONB, hence the snake_case keys.
export interface ChunkMetadata {
  type: "question" | "answer";
  question: string;
  answer: string;
  answer_chunk?: string;
  chunk_info: ChunkInfo;
}

export interface ChunkDraft {
  content: string;
  metadata: ChunkMetadata;
}

export interface EmbeddedChunk extends ChunkDraft {
  embedding: number[];
}

export interface CopyrightHolderRecord {
  id: number;
  name: string;
  createdAt: string;
}

export interface SourceRecord {
  id: number;
  copyrightHolderId: number;
  url: string;
  createdAt: string;
}

export interface ChunkRecord {
  id: number;
  sourceId: number;
  content: string;
  embedding: number[];
  metadata: ChunkMetadata;
  createdAt: string;
}

export interface StoredChunk {
  chunk: ChunkRecord;
  source: SourceRecord;
  copyrightHolder: string;
}

export interface DatabaseStatistics {
  copyright_holders: number;
  sources: number;
  chunks: number;
}

export interface EmbeddingCheck {
  hasEmbeddings: boolean;
  embeddingDimension: number | null;
  sampleText: string | null;
}

export interface IngestionSummary {
  processedRows: number;
  totalChunks: number;
  failedRows: number;
}
