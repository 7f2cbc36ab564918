import { beforeEach, describe, expect, it, vi } from "vitest";
import { ExternalServiceError } from "@corpora/errors";

interface EmbedRequest {
  texts: string[];
  model: string;
  inputType: string;
  embeddingTypes: string[];
}

const { embed } = vi.hoisted(() => ({ embed: vi.fn<(request: EmbedRequest) => Promise<unknown>>() }));

vi.mock("cohere-ai", () => ({
  CohereClient: class {
    v2 = { embed };
  },
}));

import { CohereEmbeddingProvider } from "./cohere-provider.js";

function response(vectors: number[][], inputTokens: number) {
  return { embeddings: { float: vectors }, meta: { billedUnits: { inputTokens } } };
}

describe("CohereEmbeddingProvider", () => {
  beforeEach(() => {
    embed.mockReset();
  });

  it("knows the width of its default model", () => {
    expect(new CohereEmbeddingProvider({ apiKey: "test-key" }).dimensions).toBe(1536);
    expect(
      new CohereEmbeddingProvider({ apiKey: "test-key", model: "embed-english-light-v3.0" }).dimensions,
    ).toBe(384);
  });

  it("embeds documents in slices of 96 and sums billed tokens", async () => {
    embed.mockImplementation(async ({ texts }) =>
      response(
        texts.map(() => [1, 0, 0]),
        texts.length,
      ),
    );
    const provider = new CohereEmbeddingProvider({ apiKey: "test-key", model: "embed-english-v3.0" });

    const result = await provider.batchEmbed(Array.from({ length: 100 }, (_, i) => `text ${String(i)}`));

    expect(embed).toHaveBeenCalledTimes(2);
    expect(embed.mock.calls.map(([request]) => request.texts.length)).toEqual([96, 4]);
    expect(embed).toHaveBeenCalledWith(expect.objectContaining({ inputType: "search_document" }));
    expect(result.embeddings).toHaveLength(100);
    expect(result.tokensUsed).toBe(100);
    expect(result.dimensions).toBe(3);
  });

  it("embeds single texts as queries", async () => {
    embed.mockResolvedValue(response([[0, 1]], 2));
    const provider = new CohereEmbeddingProvider({ apiKey: "test-key" });

    await provider.embed("what is sprint 0");

    expect(embed).toHaveBeenCalledWith({
      texts: ["what is sprint 0"],
      model: "embed-v4.0",
      inputType: "search_query",
      embeddingTypes: ["float"],
    });
  });

  it("wraps client failures", async () => {
    embed.mockRejectedValue(Object.assign(new Error("service unavailable"), { statusCode: 503 }));
    const provider = new CohereEmbeddingProvider({ apiKey: "test-key" });

    const failure = provider.batchEmbed(["a"]);
    await expect(failure).rejects.toThrow(ExternalServiceError);
    await expect(failure).rejects.toThrow("cohere embedding request failed: service unavailable");
    expect(await provider.healthCheck()).toBe(false);
  });
});
