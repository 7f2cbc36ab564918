import type { EmbeddingResult } from "@corpora/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly model: string;
  /** Output dimension when the provider knows it up front; otherwise probe with one call. */
  readonly dimensions?: number;

  embed(text: string): Promise<EmbeddingResult>;
  batchEmbed(texts: string[]): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
