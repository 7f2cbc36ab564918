export {
  envSchema,
  parseEnv,
  loadConfig,
  validateEmbeddingConfig,
  describeConfig,
  MAX_EMBEDDING_DIMENSION,
} from "./env.js";
export { loadRetrievalProfile, retrievalProfileSchema } from "./retrieval-profile.js";
