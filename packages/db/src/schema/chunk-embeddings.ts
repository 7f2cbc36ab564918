import { pgTable, text, timestamp, integer, vector, primaryKey, index } from "drizzle-orm/pg-core";
import { chunks } from "./chunks.js";

/** Column width of `chunk_embeddings.embedding`; every provider writing here must match it. */
export const EMBEDDING_DIMENSION = 1536;

export const chunkEmbeddings = pgTable(
  "chunk_embeddings",
  {
    chunkId: text("chunk_id")
      .notNull()
      .references(() => chunks.chunkId, { onDelete: "cascade" }),
    provider: text("provider").notNull(),
    model: text("model").notNull(),
    dimension: integer("dimension").notNull(),
    embedding: vector("embedding", { dimensions: EMBEDDING_DIMENSION }).notNull(),
    /** sha256 of the chunk text the vector was computed from */
    contentHash: text("content_hash").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.chunkId, table.provider] }),
    embeddingIdx: index("idx_chunk_embeddings_hnsw").using(
      "hnsw",
      table.embedding.op("vector_cosine_ops"),
    ),
  }),
);
