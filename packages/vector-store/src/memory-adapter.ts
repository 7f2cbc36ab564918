import { count, create, insert, remove, search } from "@orama/orama";
import type { Chunk, DocumentRecord, EmbeddingRecord } from "@corpora/types";
import type {
  CandidateRow,
  DenseSearchParams,
  IVectorStore,
  LexicalSearchParams,
  WriteBatch,
  WriteResult,
} from "./vector-store.interface.js";

export interface MemoryVectorStoreOptions {
  dimension?: number;
}

// Dropped at index and query time, so websearch `OR` never matches as a word.
const STOPWORDS = [
  "a", "an", "and", "are", "as", "at", "be", "by", "for", "from", "how", "in", "is", "it",
  "of", "on", "or", "that", "the", "to", "was", "what", "with",
];

// Cosine is in [-1, 1]; Orama's default cutoff (0.8) would hide weak neighbours.
const MIN_SIMILARITY = -1;

function createLexicalIndex() {
  return create({
    schema: { id: "string", text: "string" } as const,
    components: { tokenizer: { stopWords: STOPWORDS } },
  });
}

function createVectorIndex(dimension: number) {
  const embedding: `vector[${number}]` = `vector[${dimension}]`;
  return create({ schema: { id: "string", embedding } });
}

type LexicalIndex = ReturnType<typeof createLexicalIndex>;
type VectorIndex = ReturnType<typeof createVectorIndex>;

function embeddingKey(chunkId: string, provider: string): string {
  return `${chunkId}\u0000${provider}`;
}

function byScoreThenId(a: CandidateRow, b: CandidateRow): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
}

/**
 * Process-local store with the same contract as PgVectorStore, backed by
 * Orama: BM25 full-text over chunk text for the lexical leg and one cosine
 * vector index per provider for the dense leg. Used by tests and offline runs.
 */
export class MemoryVectorStore implements IVectorStore {
  readonly documents = new Map<string, DocumentRecord>();
  readonly chunks = new Map<string, Chunk>();
  readonly embeddings = new Map<string, EmbeddingRecord>();
  private readonly lexical: LexicalIndex = createLexicalIndex();
  private readonly vectors = new Map<string, VectorIndex>();
  private readonly dimension: number;
  /** Number of writeBatch calls that reached the store. */
  writes = 0;

  constructor(options: MemoryVectorStoreOptions = {}) {
    this.dimension = options.dimension ?? 1536;
  }

  async expectedDimension(): Promise<number> {
    return this.dimension;
  }

  async ensureSchema(): Promise<void> {}

  async getEmbeddedHashes(provider: string, chunkIds: string[]): Promise<Map<string, string>> {
    const hashes = new Map<string, string>();
    for (const chunkId of chunkIds) {
      const record = this.embeddings.get(embeddingKey(chunkId, provider));
      if (record) hashes.set(chunkId, record.contentHash);
    }
    return hashes;
  }

  async writeBatch(batch: WriteBatch): Promise<WriteResult> {
    this.writes += 1;
    for (const record of batch.embeddings) {
      if (record.vector.length !== this.dimension) {
        throw new Error(
          `expected ${String(this.dimension)} dimensions, not ${String(record.vector.length)}`,
        );
      }
    }

    for (const doc of batch.documents) this.documents.set(doc.docId, { ...doc });
    for (const chunk of batch.chunks) {
      if (this.chunks.has(chunk.chunkId)) await remove(this.lexical, chunk.chunkId);
      this.chunks.set(chunk.chunkId, chunk);
      await insert(this.lexical, { id: chunk.chunkId, text: chunk.text });
    }

    let inserted = 0;
    let updated = 0;
    for (const record of batch.embeddings) {
      const key = embeddingKey(record.chunkId, record.provider);
      const index = this.vectorIndex(record.provider);
      if (this.embeddings.has(key)) {
        await remove(index, record.chunkId);
        updated += 1;
      } else {
        inserted += 1;
      }
      this.embeddings.set(key, { ...record });
      await insert(index, { id: record.chunkId, embedding: record.vector });
    }
    return { inserted, updated };
  }

  async countEmbeddings(provider?: string): Promise<number> {
    if (provider === undefined) return this.embeddings.size;
    let total = 0;
    for (const record of this.embeddings.values()) {
      if (record.provider === provider) total += 1;
    }
    return total;
  }

  async denseSearch(params: DenseSearchParams): Promise<CandidateRow[]> {
    const index = this.vectors.get(params.provider);
    if (!index || params.vector.length !== this.dimension) return [];

    // Whitelisting happens after scoring, so ask for every indexed vector.
    const results = await search(index, {
      mode: "vector",
      vector: { value: params.vector, property: "embedding" },
      similarity: MIN_SIMILARITY,
      limit: await count(index),
    });
    return this.rank(results.hits, params.topK, params.spaceWhitelist);
  }

  async lexicalSearch(params: LexicalSearchParams): Promise<CandidateRow[]> {
    if (params.query.trim().length === 0 || this.chunks.size === 0) return [];

    // threshold 1: a chunk matching any query term is a candidate, like websearch OR.
    const results = await search(this.lexical, {
      term: params.query,
      properties: ["text"],
      threshold: 1,
      limit: this.chunks.size,
    });
    return this.rank(results.hits, params.topK, params.spaceWhitelist);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {}

  private vectorIndex(provider: string): VectorIndex {
    let index = this.vectors.get(provider);
    if (!index) {
      index = createVectorIndex(this.dimension);
      this.vectors.set(provider, index);
    }
    return index;
  }

  private rank(
    hits: ReadonlyArray<{ id: string; score: number }>,
    topK: number,
    whitelist?: string[],
  ): CandidateRow[] {
    const rows: CandidateRow[] = [];
    for (const hit of hits) {
      const row = this.candidate(hit.id, hit.score);
      if (row && this.inWhitelist(row, whitelist)) rows.push(row);
    }
    return rows.sort(byScoreThenId).slice(0, topK);
  }

  private candidate(chunkId: string, score: number): CandidateRow | undefined {
    const chunk = this.chunks.get(chunkId);
    if (!chunk) return undefined;
    const doc = this.documents.get(chunk.docId);
    return {
      chunkId,
      docId: chunk.docId,
      title: doc?.title ?? "",
      url: doc?.url ?? "",
      text: chunk.text,
      spaceKey: doc?.spaceKey ?? null,
      doctype: doc?.doctype ?? null,
      score,
    };
  }

  private inWhitelist(row: CandidateRow, whitelist?: string[]): boolean {
    if (!whitelist || whitelist.length === 0) return true;
    return row.spaceKey !== null && whitelist.includes(row.spaceKey);
  }
}
