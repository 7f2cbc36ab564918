import { CohereClient } from "cohere-ai";
import type { EmbeddingResult } from "@corpora/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { toProviderError } from "./provider-error.js";

const DEFAULT_MODEL = "embed-v4.0";
const BATCH_SIZE = 96; // Cohere limit

const KNOWN_DIMENSIONS: Record<string, number> = {
  "embed-v4.0": 1536,
  "embed-english-v3.0": 1024,
  "embed-multilingual-v3.0": 1024,
  "embed-english-light-v3.0": 384,
  "embed-multilingual-light-v3.0": 384,
};

type CohereInputType = "search_query" | "search_document";

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly model: string;
  readonly dimensions?: number;
  private client: CohereClient;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = KNOWN_DIMENSIONS[this.model];
  }

  /** Single texts are queries; Cohere embeds queries and documents differently. */
  async embed(text: string): Promise<EmbeddingResult> {
    return this.embedAs([text], "search_query");
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return this.embedAs(texts, "search_document");
  }

  private async embedAs(texts: string[], inputType: CohereInputType): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      try {
        const response = await this.client.v2.embed({
          texts: batch,
          model: this.model,
          inputType,
          embeddingTypes: ["float"],
        });

        if (response.embeddings.float) {
          allEmbeddings.push(...response.embeddings.float);
        }

        if (response.meta?.billedUnits?.inputTokens) {
          totalTokens += response.meta.billedUnits.inputTokens;
        }
      } catch (error: unknown) {
        throw toProviderError(this.name, error);
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: allEmbeddings[0]?.length ?? this.dimensions ?? 0,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }
}
