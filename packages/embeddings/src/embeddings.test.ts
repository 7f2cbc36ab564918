import { describe, it, expect } from "vitest";
import { ExternalServiceError, RateLimitedError, isRetryableError } from "@corpora/errors";
import { createEmbeddingProvider, providerFromSettings } from "./factory.js";
import { DeterministicEmbeddingProvider } from "./deterministic-provider.js";
import { toProviderError } from "./provider-error.js";

function cosine(a: number[], b: number[]): number {
  let dot = 0;
  for (let i = 0; i < a.length; i++) dot += (a[i] ?? 0) * (b[i] ?? 0);
  return dot;
}

describe("Embeddings", () => {
  describe("createEmbeddingProvider factory", () => {
    it("creates OpenAIEmbeddingProvider for type 'openai'", () => {
      const provider = createEmbeddingProvider({
        provider: "openai",
        openai: { apiKey: "test-key" },
      });
      expect(provider.name).toBe("openai");
      expect(provider.model).toBe("text-embedding-3-small");
      expect(provider.dimensions).toBe(1536);
      expect(provider.batchEmbed).toBeTypeOf("function");
    });

    it("requests a custom size only from text-embedding-3 models", () => {
      const small = createEmbeddingProvider({
        provider: "openai",
        openai: { apiKey: "test-key", model: "text-embedding-3-small", dimensions: 512 },
      });
      const ada = createEmbeddingProvider({
        provider: "openai",
        openai: { apiKey: "test-key", model: "text-embedding-ada-002", dimensions: 512 },
      });
      expect(small.dimensions).toBe(512);
      expect(ada.dimensions).toBe(1536);
    });

    it("leaves the dimension unknown for unlisted models", () => {
      const provider = createEmbeddingProvider({
        provider: "cohere",
        cohere: { apiKey: "test-key", model: "embed-experimental" },
      });
      expect(provider.name).toBe("cohere");
      expect(provider.dimensions).toBeUndefined();
    });

    it("creates CohereEmbeddingProvider with a known model size", () => {
      const provider = createEmbeddingProvider({
        provider: "cohere",
        cohere: { apiKey: "test-key", model: "embed-english-v3.0" },
      });
      expect(provider.dimensions).toBe(1024);
    });

    it("throws for missing openai config", () => {
      expect(() => createEmbeddingProvider({ provider: "openai" })).toThrow(
        "OpenAI config is required",
      );
    });

    it("throws for missing cohere config", () => {
      expect(() => createEmbeddingProvider({ provider: "cohere" })).toThrow(
        "Cohere config is required",
      );
    });

    it("throws for unknown provider", () => {
      expect(() => createEmbeddingProvider({ provider: "unknown" as "cohere" })).toThrow(
        "Unknown embedding provider",
      );
    });

    it("builds a deterministic provider from settings", () => {
      const provider = providerFromSettings({
        provider: "deterministic",
        model: "deterministic-v1",
        dimension: 64,
      });
      expect(provider.name).toBe("deterministic");
      expect(provider.dimensions).toBe(64);
    });
  });

  describe("DeterministicEmbeddingProvider", () => {
    const provider = new DeterministicEmbeddingProvider({ dimensions: 256 });

    it("returns unit vectors of the configured size", async () => {
      const result = await provider.batchEmbed(["alpha beta", "gamma"]);
      expect(result.embeddings).toHaveLength(2);
      expect(result.dimensions).toBe(256);
      for (const vector of result.embeddings) {
        expect(vector).toHaveLength(256);
        expect(cosine(vector, vector)).toBeCloseTo(1, 6);
      }
    });

    it("is stable across calls and ignores case and outer whitespace", () => {
      expect(provider.vectorFor("  Sprint Zero ")).toEqual(provider.vectorFor("sprint zero"));
    });

    it("places texts that share vocabulary closer together", () => {
      const query = provider.vectorFor("lifecycle phases discovery build optimize");
      const related = provider.vectorFor("the lifecycle has discovery build and optimize phases");
      const unrelated = provider.vectorFor("quarterly expense report for travel");
      expect(cosine(query, related)).toBeGreaterThan(cosine(query, unrelated));
    });

    it("produces a non-zero vector for text without terms", () => {
      const vector = provider.vectorFor("---");
      expect(vector.some((v) => v !== 0)).toBe(true);
    });

    it("estimates tokens at four characters per token", async () => {
      const result = await provider.batchEmbed(["abcd", "abcde"]);
      expect(result.tokensUsed).toBe(3);
    });
  });

  describe("toProviderError", () => {
    it("maps 429 to a retryable RateLimitedError", () => {
      const error = toProviderError("openai", Object.assign(new Error("slow down"), { status: 429 }));
      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error.message).toBe("openai embedding request failed: slow down");
      expect(isRetryableError(error)).toBe(true);
    });

    it("keeps a 4xx status so the batch is not retried", () => {
      const error = toProviderError("cohere", { statusCode: 400, message: "bad input" });
      expect(error).toBeInstanceOf(ExternalServiceError);
      expect(error.statusCode).toBe(400);
      expect(isRetryableError(error)).toBe(false);
    });

    it("treats failures without a status as a retryable 502", () => {
      const error = toProviderError("openai", new Error("socket hang up"));
      expect(error.statusCode).toBe(502);
      expect(isRetryableError(error)).toBe(true);
    });
  });
});
