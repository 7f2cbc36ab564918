import { describe, it, expect } from "vitest";
import { getSchemaMigrationSql } from "./migrations.js";
import { EMBEDDING_DIMENSION } from "./schema/index.js";

describe("getSchemaMigrationSql", () => {
  it("enables pgvector before creating tables", () => {
    const statements = getSchemaMigrationSql();
    expect(statements[0]).toBe("CREATE EXTENSION IF NOT EXISTS vector");
  });

  it("sizes the embedding column to the store dimension", () => {
    const ddl = getSchemaMigrationSql(768).join("\n");
    expect(ddl).toContain("embedding vector(768) NOT NULL");
    expect(getSchemaMigrationSql().join("\n")).toContain(
      `embedding vector(${String(EMBEDDING_DIMENSION)}) NOT NULL`,
    );
  });

  it("keys embeddings on (chunk_id, provider)", () => {
    const ddl = getSchemaMigrationSql().join("\n");
    expect(ddl).toContain("PRIMARY KEY (chunk_id, provider)");
  });

  it("creates the full-text and cosine indexes", () => {
    const statements = getSchemaMigrationSql();
    expect(statements).toContain(
      "CREATE INDEX IF NOT EXISTS idx_chunks_text_search ON chunks USING gin (to_tsvector('english', text))",
    );
    expect(statements).toContain(
      "CREATE INDEX IF NOT EXISTS idx_chunk_embeddings_hnsw ON chunk_embeddings USING hnsw (embedding vector_cosine_ops)",
    );
  });

  it("only uses idempotent statements", () => {
    for (const statement of getSchemaMigrationSql()) {
      expect(statement).toMatch(/IF NOT EXISTS/);
    }
  });
});
