import { sql } from "drizzle-orm";
import { EMBEDDING_DIMENSION } from "./schema/index.js";
import type { DbClient } from "./client.js";

/**
 * Idempotent DDL for the knowledge base. Statements run in order; each one
 * can be re-applied to an existing database.
 */
export function getSchemaMigrationSql(dimension: number = EMBEDDING_DIMENSION): string[] {
  return [
    `CREATE EXTENSION IF NOT EXISTS vector`,
    `CREATE TABLE IF NOT EXISTS documents (
      doc_id TEXT PRIMARY KEY,
      source_system TEXT NOT NULL,
      title TEXT NOT NULL,
      url TEXT NOT NULL,
      space_key TEXT,
      doctype TEXT,
      meta JSONB NOT NULL DEFAULT '{}'::jsonb,
      created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )`,
    `CREATE INDEX IF NOT EXISTS idx_documents_source_space ON documents (source_system, space_key)`,
    `CREATE TABLE IF NOT EXISTS chunks (
      chunk_id TEXT PRIMARY KEY,
      doc_id TEXT NOT NULL REFERENCES documents (doc_id) ON DELETE CASCADE,
      ordinal INTEGER NOT NULL,
      text TEXT NOT NULL,
      token_count INTEGER NOT NULL,
      char_start INTEGER NOT NULL,
      char_end INTEGER NOT NULL,
      chunk_type TEXT NOT NULL,
      split_strategy TEXT NOT NULL,
      meta JSONB NOT NULL DEFAULT '{}'::jsonb,
      created_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )`,
    `CREATE UNIQUE INDEX IF NOT EXISTS idx_chunks_doc_ordinal ON chunks (doc_id, ordinal)`,
    `CREATE INDEX IF NOT EXISTS idx_chunks_text_search ON chunks USING gin (to_tsvector('english', text))`,
    `CREATE TABLE IF NOT EXISTS chunk_embeddings (
      chunk_id TEXT NOT NULL REFERENCES chunks (chunk_id) ON DELETE CASCADE,
      provider TEXT NOT NULL,
      model TEXT NOT NULL,
      dimension INTEGER NOT NULL,
      embedding vector(${String(dimension)}) NOT NULL,
      content_hash TEXT NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT now(),
      PRIMARY KEY (chunk_id, provider)
    )`,
    `CREATE INDEX IF NOT EXISTS idx_chunk_embeddings_hnsw ON chunk_embeddings USING hnsw (embedding vector_cosine_ops)`,
  ];
}

export async function migrate(
  db: DbClient,
  dimension: number = EMBEDDING_DIMENSION,
): Promise<void> {
  for (const statement of getSchemaMigrationSql(dimension)) {
    await db.execute(sql.raw(statement));
  }
}
