export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { OpenAIEmbeddingProvider } from "./openai-provider.js";
export type { OpenAIProviderConfig } from "./openai-provider.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { DeterministicEmbeddingProvider } from "./deterministic-provider.js";
export type { DeterministicProviderConfig } from "./deterministic-provider.js";
export { toProviderError } from "./provider-error.js";
export { createEmbeddingProvider, providerFromSettings } from "./factory.js";
export type { EmbeddingFactoryConfig } from "./factory.js";
