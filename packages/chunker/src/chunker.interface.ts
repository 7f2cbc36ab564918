import type { Chunk, ChunkingConfig, DocumentCoverage, SourceDocument } from "@corpora/types";

export interface DocumentChunks {
  chunks: Chunk[];
  coverage: DocumentCoverage;
}

export interface IChunker {
  readonly strategy: string;
  /** Throws ChunkingError when the document cannot be chunked within the invariants. */
  chunk(document: SourceDocument, config: ChunkingConfig): DocumentChunks;
}
