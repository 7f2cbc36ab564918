import { sql } from "drizzle-orm";
import { pgTable, text, timestamp, jsonb, integer, index, uniqueIndex } from "drizzle-orm/pg-core";
import type { ChunkMeta, ChunkType, SplitStrategy } from "@corpora/types";
import { documents } from "./documents.js";

export const chunks = pgTable(
  "chunks",
  {
    /** `<doc_id>:<ordinal padded to 4 digits>` */
    chunkId: text("chunk_id").primaryKey(),
    docId: text("doc_id")
      .notNull()
      .references(() => documents.docId, { onDelete: "cascade" }),
    ordinal: integer("ordinal").notNull(),
    text: text("text").notNull(),
    tokenCount: integer("token_count").notNull(),
    charStart: integer("char_start").notNull(),
    charEnd: integer("char_end").notNull(),
    chunkType: text("chunk_type").notNull().$type<ChunkType>(),
    splitStrategy: text("split_strategy").notNull().$type<SplitStrategy>(),
    meta: jsonb("meta").notNull().default({}).$type<ChunkMeta>(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    docOrdinalIdx: uniqueIndex("idx_chunks_doc_ordinal").on(table.docId, table.ordinal),
    textSearchIdx: index("idx_chunks_text_search").using(
      "gin",
      sql`to_tsvector('english', ${table.text})`,
    ),
  }),
);
