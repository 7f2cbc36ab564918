import OpenAI from "openai";
import type { EmbeddingResult } from "@corpora/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { toProviderError } from "./provider-error.js";

const DEFAULT_MODEL = "text-embedding-3-small";
const MAX_BATCH_SIZE = 2048; // API limit on inputs per request

const KNOWN_DIMENSIONS: Record<string, number> = {
  "text-embedding-3-small": 1536,
  "text-embedding-3-large": 3072,
  "text-embedding-ada-002": 1536,
};

export interface OpenAIProviderConfig {
  apiKey: string;
  model?: string;
  /** Requested output size; only text-embedding-3 models accept it. */
  dimensions?: number;
  baseURL?: string;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "openai";
  readonly model: string;
  readonly dimensions?: number;
  private readonly requestDimensions?: number;
  private client: OpenAI;

  constructor(config: OpenAIProviderConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL });
    this.model = config.model ?? DEFAULT_MODEL;
    this.requestDimensions = this.model.startsWith("text-embedding-3") ? config.dimensions : undefined;
    this.dimensions = this.requestDimensions ?? KNOWN_DIMENSIONS[this.model];
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += MAX_BATCH_SIZE) {
      const batch = texts.slice(i, i + MAX_BATCH_SIZE);

      let response: OpenAI.Embeddings.CreateEmbeddingResponse;
      try {
        response = await this.client.embeddings.create({
          model: this.model,
          input: batch,
          ...(this.requestDimensions !== undefined ? { dimensions: this.requestDimensions } : {}),
        });
      } catch (error: unknown) {
        throw toProviderError(this.name, error);
      }

      // The API may return items out of order
      const sorted = [...response.data].sort((a, b) => a.index - b.index);
      for (const item of sorted) allEmbeddings.push(item.embedding);
      totalTokens += response.usage.total_tokens;
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
