import type { Chunk, DocumentRecord, EmbeddingRecord } from "@corpora/types";

/** Chunk joined with its document, as both search legs return it. */
export interface CandidateRow {
  chunkId: string;
  docId: string;
  title: string;
  url: string;
  text: string;
  spaceKey: string | null;
  doctype: string | null;
  /** Leg-specific relevance; higher is better. */
  score: number;
}

export interface DenseSearchParams {
  vector: number[];
  provider: string;
  topK: number;
  spaceWhitelist?: string[];
}

export interface LexicalSearchParams {
  /** websearch syntax: bare terms, "quoted phrases", OR */
  query: string;
  topK: number;
  spaceWhitelist?: string[];
}

export interface WriteBatch {
  documents: DocumentRecord[];
  chunks: Chunk[];
  embeddings: EmbeddingRecord[];
}

export interface WriteResult {
  inserted: number;
  updated: number;
}

export interface IVectorStore {
  /** Width of the stored embedding column. */
  expectedDimension(): Promise<number>;
  ensureSchema(): Promise<void>;
  /** content hash per chunk already embedded under `provider` */
  getEmbeddedHashes(provider: string, chunkIds: string[]): Promise<Map<string, string>>;
  /** Upsert documents and chunks, then embeddings keyed on (chunk_id, provider). */
  writeBatch(batch: WriteBatch): Promise<WriteResult>;
  countEmbeddings(provider?: string): Promise<number>;
  denseSearch(params: DenseSearchParams): Promise<CandidateRow[]>;
  lexicalSearch(params: LexicalSearchParams): Promise<CandidateRow[]>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
