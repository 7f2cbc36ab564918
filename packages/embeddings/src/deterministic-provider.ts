import { createHash } from "node:crypto";
import type { EmbeddingResult } from "@corpora/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_DIMENSIONS = 1536;
const MODEL = "deterministic-v1";
const TERM_PATTERN = /[\p{L}\p{N}]+/gu;

export interface DeterministicProviderConfig {
  dimensions?: number;
}

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

/**
 * Offline provider for tests and local runs. Each lower-cased term is hashed
 * with sha256 into one signed bucket (feature hashing), and the result is
 * L2-normalized, so texts sharing vocabulary land close under cosine.
 */
export class DeterministicEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "deterministic";
  readonly model = MODEL;
  readonly dimensions: number;

  constructor(config: DeterministicProviderConfig = {}) {
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const normalized = text.trim().toLowerCase();
    const terms = normalized.match(TERM_PATTERN) ?? [];

    for (const term of terms) {
      const hash = digest(term);
      const index = hash.readUInt32BE(0) % this.dimensions;
      vector[index] += hash[4] & 1 ? -1 : 1;
    }

    // No terms: fall back to one bucket picked by the whole text
    if (terms.length === 0) {
      vector[digest(normalized).readUInt32BE(0) % this.dimensions] = 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    if (norm === 0) {
      // Every term cancelled out; keep the vector non-zero
      vector[digest(normalized).readUInt32BE(0) % this.dimensions] = 1;
      return vector;
    }
    return vector.map((v) => v / norm);
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return {
      embeddings: texts.map((text) => this.vectorFor(text)),
      model: this.model,
      tokensUsed: texts.reduce((sum, text) => sum + Math.ceil(text.length / 4), 0),
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}
