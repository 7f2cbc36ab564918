import { createDbClient, type PoolProfile } from "@corpora/db";
import type { IVectorStore } from "./vector-store.interface.js";
import { PgVectorStore } from "./pgvector-adapter.js";
import { MemoryVectorStore } from "./memory-adapter.js";

export type {
  IVectorStore,
  CandidateRow,
  DenseSearchParams,
  LexicalSearchParams,
  WriteBatch,
  WriteResult,
} from "./vector-store.interface.js";
export { PgVectorStore } from "./pgvector-adapter.js";
export type { PgVectorStoreOptions } from "./pgvector-adapter.js";
export { MemoryVectorStore } from "./memory-adapter.js";
export type { MemoryVectorStoreOptions } from "./memory-adapter.js";

export type VectorStoreType = "pgvector" | "memory";

export interface VectorStoreConfig {
  type: VectorStoreType;
  pgConnectionString?: string;
  maxConnections?: number;
  poolProfile?: PoolProfile;
  dimension?: number;
}

export function createVectorStore(config: VectorStoreConfig): IVectorStore {
  switch (config.type) {
    case "pgvector":
      if (!config.pgConnectionString) {
        throw new Error("pgConnectionString is required for pgvector store");
      }
      return new PgVectorStore(
        createDbClient({
          url: config.pgConnectionString,
          maxConnections: config.maxConnections,
          profile: config.poolProfile,
        }),
        { dimension: config.dimension },
      );
    case "memory":
      return new MemoryVectorStore({ dimension: config.dimension });
    default:
      throw new Error(`Unknown vector store type: ${String(config.type)}`);
  }
}
