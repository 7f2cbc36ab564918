import { pgTable, text, timestamp, jsonb, index } from "drizzle-orm/pg-core";

export const documents = pgTable(
  "documents",
  {
    docId: text("doc_id").primaryKey(),
    sourceSystem: text("source_system").notNull(),
    title: text("title").notNull(),
    url: text("url").notNull(),
    spaceKey: text("space_key"),
    doctype: text("doctype"),
    meta: jsonb("meta").notNull().default({}).$type<Record<string, unknown>>(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    sourceSpaceIdx: index("idx_documents_source_space").on(table.sourceSystem, table.spaceKey),
  }),
);
