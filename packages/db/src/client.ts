import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

/**
 * `query` serves retrieval: many short reads. `worker` serves embed runs,
 * each holding a connection between batches for the length of the run.
 */
export type PoolProfile = "query" | "worker";

const POOL_PROFILES: Record<PoolProfile, { max: number; idleTimeout: number }> = {
  query: { max: 10, idleTimeout: 20 },
  worker: { max: 5, idleTimeout: 30 },
};

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
  profile?: PoolProfile;
}

export function createDbClient(options: DbClientOptions) {
  const profile = POOL_PROFILES[options.profile ?? "query"];
  const connection = postgres(options.url, {
    max: options.maxConnections ?? profile.max,
    idle_timeout: profile.idleTimeout,
    connect_timeout: 10,
    // CREATE ... IF NOT EXISTS notices are expected on every start
    onnotice: () => undefined,
  });

  return drizzle(connection, { schema });
}

export type DbClient = ReturnType<typeof createDbClient>;

export async function closeDbClient(db: DbClient): Promise<void> {
  await db.$client.end({ timeout: 5 });
}
