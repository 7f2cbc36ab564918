export { documents } from "./documents.js";
export { chunks } from "./chunks.js";
export { chunkEmbeddings, EMBEDDING_DIMENSION } from "./chunk-embeddings.js";
