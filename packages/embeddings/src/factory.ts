import type { EmbeddingProviderName } from "@corpora/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { OpenAIEmbeddingProvider } from "./openai-provider.js";
import type { OpenAIProviderConfig } from "./openai-provider.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereProviderConfig } from "./cohere-provider.js";
import { DeterministicEmbeddingProvider } from "./deterministic-provider.js";
import type { DeterministicProviderConfig } from "./deterministic-provider.js";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderName;
  openai?: OpenAIProviderConfig;
  cohere?: CohereProviderConfig;
  deterministic?: DeterministicProviderConfig;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "openai":
      if (!config.openai) {
        throw new Error("OpenAI config is required when provider is 'openai'");
      }
      return new OpenAIEmbeddingProvider(config.openai);
    case "cohere":
      if (!config.cohere) {
        throw new Error("Cohere config is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider(config.cohere);
    case "deterministic":
      return new DeterministicEmbeddingProvider(config.deterministic);
    default:
      throw new Error(`Unknown embedding provider: ${String(config.provider)}`);
  }
}

/** Build the provider an EmbeddingConfig-shaped settings object describes. */
export function providerFromSettings(settings: {
  provider: EmbeddingProviderName;
  model: string;
  dimension: number;
  openaiApiKey?: string;
  cohereApiKey?: string;
}): IEmbeddingProvider {
  switch (settings.provider) {
    case "openai":
      return createEmbeddingProvider({
        provider: "openai",
        openai: {
          apiKey: settings.openaiApiKey ?? "",
          model: settings.model,
          dimensions: settings.dimension,
        },
      });
    case "cohere":
      return createEmbeddingProvider({
        provider: "cohere",
        cohere: { apiKey: settings.cohereApiKey ?? "", model: settings.model },
      });
    case "deterministic":
      return createEmbeddingProvider({
        provider: "deterministic",
        deterministic: { dimensions: settings.dimension },
      });
  }
}
