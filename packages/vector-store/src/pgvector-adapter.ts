import { and, asc, count, cosineDistance, desc, eq, inArray, sql, type SQL } from "drizzle-orm";
import {
  chunkEmbeddings,
  chunks,
  closeDbClient,
  documents,
  EMBEDDING_DIMENSION,
  migrate,
  type DbClient,
} from "@corpora/db";
import type {
  CandidateRow,
  DenseSearchParams,
  IVectorStore,
  LexicalSearchParams,
  WriteBatch,
  WriteResult,
} from "./vector-store.interface.js";

const HASH_LOOKUP_CHUNK = 1_000;

export interface PgVectorStoreOptions {
  /** Used when the embedding column does not exist yet. */
  dimension?: number;
}

/**
 * PostgreSQL store: pgvector cosine distance for the dense leg, `ts_rank_cd`
 * over `to_tsvector('english', text)` for the lexical leg. Writers rely only
 * on the (chunk_id, provider) primary key.
 */
export class PgVectorStore implements IVectorStore {
  private readonly dimension: number;

  constructor(
    private readonly db: DbClient,
    options: PgVectorStoreOptions = {},
  ) {
    this.dimension = options.dimension ?? EMBEDDING_DIMENSION;
  }

  async expectedDimension(): Promise<number> {
    // pgvector stores the declared width in atttypmod
    const rows = await this.db.execute(
      sql`SELECT atttypmod AS dim FROM pg_attribute
          WHERE attrelid = to_regclass('chunk_embeddings') AND attname = 'embedding'`,
    );
    const dim = rows[0]?.["dim"];
    return typeof dim === "number" && dim > 0 ? dim : this.dimension;
  }

  async ensureSchema(): Promise<void> {
    await migrate(this.db, this.dimension);
  }

  async getEmbeddedHashes(provider: string, chunkIds: string[]): Promise<Map<string, string>> {
    const hashes = new Map<string, string>();
    for (let i = 0; i < chunkIds.length; i += HASH_LOOKUP_CHUNK) {
      const ids = chunkIds.slice(i, i + HASH_LOOKUP_CHUNK);
      const rows = await this.db
        .select({ chunkId: chunkEmbeddings.chunkId, contentHash: chunkEmbeddings.contentHash })
        .from(chunkEmbeddings)
        .where(and(eq(chunkEmbeddings.provider, provider), inArray(chunkEmbeddings.chunkId, ids)));
      for (const row of rows) hashes.set(row.chunkId, row.contentHash);
    }
    return hashes;
  }

  async writeBatch(batch: WriteBatch): Promise<WriteResult> {
    if (batch.embeddings.length === 0 && batch.chunks.length === 0) {
      return { inserted: 0, updated: 0 };
    }

    return this.db.transaction(async (tx) => {
      if (batch.documents.length > 0) {
        await tx
          .insert(documents)
          .values(
            batch.documents.map((doc) => ({
              docId: doc.docId,
              sourceSystem: doc.sourceSystem,
              title: doc.title,
              url: doc.url,
              spaceKey: doc.spaceKey ?? null,
              doctype: doc.doctype ?? null,
            })),
          )
          .onConflictDoUpdate({
            target: documents.docId,
            set: {
              sourceSystem: sql`excluded.source_system`,
              title: sql`excluded.title`,
              url: sql`excluded.url`,
              spaceKey: sql`excluded.space_key`,
              doctype: sql`excluded.doctype`,
              updatedAt: sql`now()`,
            },
          });
      }

      if (batch.chunks.length > 0) {
        await tx
          .insert(chunks)
          .values(
            batch.chunks.map((chunk) => ({
              chunkId: chunk.chunkId,
              docId: chunk.docId,
              ordinal: chunk.ordinal,
              text: chunk.text,
              tokenCount: chunk.tokenCount,
              charStart: chunk.charStart,
              charEnd: chunk.charEnd,
              chunkType: chunk.chunkType,
              splitStrategy: chunk.splitStrategy,
              meta: chunk.meta ?? {},
            })),
          )
          .onConflictDoUpdate({
            target: chunks.chunkId,
            set: {
              ordinal: sql`excluded.ordinal`,
              text: sql`excluded.text`,
              tokenCount: sql`excluded.token_count`,
              charStart: sql`excluded.char_start`,
              charEnd: sql`excluded.char_end`,
              chunkType: sql`excluded.chunk_type`,
              splitStrategy: sql`excluded.split_strategy`,
              meta: sql`excluded.meta`,
            },
          });
      }

      if (batch.embeddings.length === 0) return { inserted: 0, updated: 0 };

      const rows = await tx
        .insert(chunkEmbeddings)
        .values(
          batch.embeddings.map((record) => ({
            chunkId: record.chunkId,
            provider: record.provider,
            model: record.model,
            dimension: record.dimension,
            embedding: record.vector,
            contentHash: record.contentHash,
          })),
        )
        .onConflictDoUpdate({
          target: [chunkEmbeddings.chunkId, chunkEmbeddings.provider],
          set: {
            model: sql`excluded.model`,
            dimension: sql`excluded.dimension`,
            embedding: sql`excluded.embedding`,
            contentHash: sql`excluded.content_hash`,
            updatedAt: sql`now()`,
          },
        })
        // xmax is 0 only on rows this statement inserted
        .returning({ inserted: sql<boolean>`(xmax = 0)` });

      const inserted = rows.filter((row) => row.inserted).length;
      return { inserted, updated: rows.length - inserted };
    });
  }

  async countEmbeddings(provider?: string): Promise<number> {
    const rows = await this.db
      .select({ total: count() })
      .from(chunkEmbeddings)
      .where(provider === undefined ? undefined : eq(chunkEmbeddings.provider, provider));
    return rows[0]?.total ?? 0;
  }

  async denseSearch(params: DenseSearchParams): Promise<CandidateRow[]> {
    const distance = cosineDistance(chunkEmbeddings.embedding, params.vector).mapWith(Number);
    const conditions: SQL[] = [
      eq(chunkEmbeddings.provider, params.provider),
      eq(chunkEmbeddings.dimension, params.vector.length),
    ];
    if (params.spaceWhitelist && params.spaceWhitelist.length > 0) {
      conditions.push(inArray(documents.spaceKey, params.spaceWhitelist));
    }

    const rows = await this.db
      .select({
        chunkId: chunks.chunkId,
        docId: chunks.docId,
        title: documents.title,
        url: documents.url,
        text: chunks.text,
        spaceKey: documents.spaceKey,
        doctype: documents.doctype,
        distance,
      })
      .from(chunkEmbeddings)
      .innerJoin(chunks, eq(chunks.chunkId, chunkEmbeddings.chunkId))
      .innerJoin(documents, eq(documents.docId, chunks.docId))
      .where(and(...conditions))
      .orderBy(distance, asc(chunks.chunkId))
      .limit(params.topK);

    return rows.map(({ distance: d, ...row }) => ({ ...row, score: 1 - d }));
  }

  async lexicalSearch(params: LexicalSearchParams): Promise<CandidateRow[]> {
    const tsQuery = sql`websearch_to_tsquery('english', ${params.query})`;
    const tsVector = sql`to_tsvector('english', ${chunks.text})`;
    const rank = sql<number>`ts_rank_cd(${tsVector}, ${tsQuery})`.mapWith(Number);

    const conditions: SQL[] = [sql`${tsVector} @@ ${tsQuery}`];
    if (params.spaceWhitelist && params.spaceWhitelist.length > 0) {
      conditions.push(inArray(documents.spaceKey, params.spaceWhitelist));
    }

    const rows = await this.db
      .select({
        chunkId: chunks.chunkId,
        docId: chunks.docId,
        title: documents.title,
        url: documents.url,
        text: chunks.text,
        spaceKey: documents.spaceKey,
        doctype: documents.doctype,
        rank,
      })
      .from(chunks)
      .innerJoin(documents, eq(documents.docId, chunks.docId))
      .where(and(...conditions))
      .orderBy(desc(rank), asc(chunks.chunkId))
      .limit(params.topK);

    return rows.map(({ rank: r, ...row }) => ({ ...row, score: r }));
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.db.execute(sql`SELECT 1`);
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await closeDbClient(this.db);
  }
}
