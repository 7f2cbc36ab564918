export * from "./schema/index.js";
export {
  createDbClient,
  closeDbClient,
  type DbClient,
  type DbClientOptions,
  type PoolProfile,
} from "./client.js";
export { getSchemaMigrationSql, migrate } from "./migrations.js";
