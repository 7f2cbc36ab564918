import { describe, expect, it, vi } from "vitest";
import type { Chunk, DocumentRecord, PreflightReport } from "@corpora/types";
import { DeterministicEmbeddingProvider, type IEmbeddingProvider } from "@corpora/embeddings";
import { MemoryVectorStore } from "@corpora/vector-store";
import {
  DimensionMismatchError,
  ExternalServiceError,
  PreflightBlockedError,
  RateLimitedError,
} from "@corpora/errors";
import { MemoryEventSink } from "@corpora/logger";
import { ingest, type IngestionDependencies } from "./ingestion-pipeline.js";
import { arrayChunkSource } from "./materialized-chunks.js";

const noWait = { sleep: async () => undefined, jitter: false, baseDelayMs: 10 };

function makeChunk(docId: string, ordinal: number): Chunk {
  const text = `Paragraph ${String(ordinal)} of ${docId} about onboarding steps.`;
  return {
    chunkId: `${docId}:${String(ordinal).padStart(4, "0")}`,
    docId,
    ordinal,
    text,
    tokenCount: 10,
    charStart: ordinal * 100,
    charEnd: ordinal * 100 + text.length,
    chunkType: "paragraph",
    splitStrategy: "paragraph",
    traceability: {
      title: `Title ${docId}`,
      url: `https://wiki.example.test/${docId}`,
      sourceSystem: "confluence",
    },
  };
}

function makeChunks(docs: number, perDoc: number): Chunk[] {
  const chunks: Chunk[] = [];
  for (let d = 0; d < docs; d++) {
    for (let i = 0; i < perDoc; i++) chunks.push(makeChunk(`d${String(d)}`, i));
  }
  return chunks;
}

function readyReport(skipList: string[] = []): PreflightReport {
  return {
    runId: "run-1",
    status: "READY",
    reasons: [],
    embeddableDocs: 3,
    belowThresholdPct: 0,
    skipList,
    provider: "deterministic",
    model: "deterministic-v1",
    dimension: 8,
    docTotals: { all: 3, embeddable: 3, skipped: skipList.length },
    artifacts: { enriched: true, chunks: true, tokenizer: true, config: true },
    configIssues: [],
    timestamp: "2026-01-01T00:00:00.000Z",
  };
}

function setup(chunks: Chunk[], overrides: Partial<IngestionDependencies> = {}, docs: DocumentRecord[] = []) {
  const provider = new DeterministicEmbeddingProvider({ dimensions: 8 });
  const store = new MemoryVectorStore({ dimension: 8 });
  const events = new MemoryEventSink();
  const deps: IngestionDependencies = {
    source: arrayChunkSource("run-1", chunks, docs),
    preflight: readyReport(),
    embeddingProvider: provider,
    vectorStore: store,
    events,
    ...overrides,
  };
  return { provider, store, events, deps };
}

describe("ingest", () => {
  describe("preflight gate", () => {
    it("refuses a run without a preflight report", async () => {
      const { deps, store } = setup(makeChunks(1, 1), { preflight: undefined });

      await expect(ingest(deps)).rejects.toThrow("Preflight blocked: not run");
      expect(store.writes).toBe(0);
    });

    it("refuses a blocked run", async () => {
      const { deps, store } = setup(makeChunks(1, 1), {
        preflight: { ...readyReport(), status: "BLOCKED", reasons: ["MISSING_ENRICH"] },
      });

      await expect(ingest(deps)).rejects.toThrow(PreflightBlockedError);
      expect(store.writes).toBe(0);
    });
  });

  describe("dimension guard", () => {
    it("fails before any write when the provider width differs from the store", async () => {
      const provider = new DeterministicEmbeddingProvider({ dimensions: 768 });
      const store = new MemoryVectorStore({ dimension: 1536 });
      const batchEmbed = vi.spyOn(provider, "batchEmbed");
      const { deps } = setup(makeChunks(2, 2), { embeddingProvider: provider, vectorStore: store });

      const run = ingest(deps);
      await expect(run).rejects.toThrow(DimensionMismatchError);
      await expect(run).rejects.toThrow(
        "Dimension mismatch: expected 1536, got 768 (provider=deterministic, model=deterministic-v1)",
      );
      expect(store.writes).toBe(0);
      expect(batchEmbed).not.toHaveBeenCalled();
    });

    it("probes a provider that declares no width", async () => {
      const inner = new DeterministicEmbeddingProvider({ dimensions: 768 });
      const embed = vi.fn((text: string) => inner.embed(text));
      const undeclared: IEmbeddingProvider = {
        name: "deterministic",
        model: "deterministic-v1",
        embed,
        batchEmbed: (texts) => inner.batchEmbed(texts),
        healthCheck: () => inner.healthCheck(),
      };
      const store = new MemoryVectorStore({ dimension: 1536 });
      const { deps } = setup(makeChunks(1, 1), { embeddingProvider: undeclared, vectorStore: store });

      await expect(ingest(deps)).rejects.toThrow("expected 1536, got 768");
      expect(embed).toHaveBeenCalledWith("dimension probe");
      expect(store.writes).toBe(0);
    });

    it("treats a wrong width mid-run as fatal", async () => {
      const { deps, provider, store } = setup(makeChunks(1, 2), {}, []);
      vi.spyOn(provider, "batchEmbed").mockResolvedValueOnce({
        embeddings: [
          [1, 0, 0, 0],
          [0, 1, 0, 0],
        ],
        model: "deterministic-v1",
        tokensUsed: 4,
        dimensions: 4,
      });

      await expect(ingest(deps, { retry: noWait })).rejects.toThrow("expected 8, got 4");
      expect(store.writes).toBe(0);
    });
  });

  describe("idempotent upserts", () => {
    it("writes each chunk once per provider across re-runs", async () => {
      const chunks = makeChunks(10, 10);
      const { deps, store } = setup(chunks);

      const first = await ingest(deps);
      expect(first.chunksEmbedded).toBe(100);
      expect(first.rowsInserted).toBe(100);
      expect(first.batches).toBe(1);
      expect(await store.countEmbeddings("deterministic")).toBe(100);

      const second = await ingest(deps);
      expect(second.chunksUnchanged).toBe(100);
      expect(second.chunksEmbedded).toBe(0);
      expect(second.batches).toBe(0);
      expect(store.writes).toBe(1);
      expect(await store.countEmbeddings("deterministic")).toBe(100);
    });

    it("updates rows in place when re-embedding everything", async () => {
      const { deps, store } = setup(makeChunks(10, 10));
      await ingest(deps);

      const again = await ingest(deps, { reembedAll: true });

      expect(again.rowsInserted).toBe(0);
      expect(again.rowsUpdated).toBe(100);
      expect(await store.countEmbeddings()).toBe(100);
    });

    it("re-embeds only chunks whose text changed", async () => {
      const chunks = makeChunks(2, 2);
      const { deps, store } = setup(chunks);
      await ingest(deps);

      const edited = chunks.map((chunk) =>
        chunk.chunkId === "d1:0001" ? { ...chunk, text: "Rewritten paragraph." } : chunk,
      );
      const summary = await ingest({ ...deps, source: arrayChunkSource("run-1", edited) });

      expect(summary.chunksUnchanged).toBe(3);
      expect(summary.chunksEmbedded).toBe(1);
      expect(summary.rowsUpdated).toBe(1);
      expect(store.chunks.get("d1:0001")?.text).toBe("Rewritten paragraph.");
    });
  });

  it("never sends skipped documents to the provider", async () => {
    const { deps, provider, store } = setup(makeChunks(3, 2), { preflight: readyReport(["d1"]) });
    const batchEmbed = vi.spyOn(provider, "batchEmbed");

    const summary = await ingest(deps);

    expect(summary.chunksTotal).toBe(6);
    expect(summary.chunksSkipped).toBe(2);
    expect(summary.chunksEmbedded).toBe(4);
    const sent = batchEmbed.mock.calls.flatMap(([texts]) => texts);
    expect(sent.some((text) => text.includes("of d1 "))).toBe(false);
    expect([...store.chunks.keys()].some((id) => id.startsWith("d1:"))).toBe(false);
  });

  it("splits the work into batches of the configured size", async () => {
    const { deps, provider } = setup(makeChunks(3, 100));
    const batchEmbed = vi.spyOn(provider, "batchEmbed");

    const summary = await ingest(deps, { batchSize: 128 });

    expect(summary.batches).toBe(3);
    expect(batchEmbed.mock.calls.map(([texts]) => texts.length)).toEqual([128, 128, 44]);
  });

  it("stores per-document attributes beside the chunks", async () => {
    const docs: DocumentRecord[] = [
      {
        docId: "d0",
        title: "Onboarding",
        url: "https://wiki.example.test/d0",
        sourceSystem: "confluence",
        spaceKey: "N2S",
        doctype: "playbook",
      },
    ];
    const { deps, store } = setup(makeChunks(2, 1), {}, docs);

    await ingest(deps);

    expect(store.documents.get("d0")).toEqual(docs[0]);
    expect(store.documents.get("d1")).toEqual({
      docId: "d1",
      title: "Title d1",
      url: "https://wiki.example.test/d1",
      sourceSystem: "confluence",
    });
  });

  describe("retries and failures", () => {
    it("retries a rate-limited batch and reports the attempt", async () => {
      const { deps, provider, events } = setup(makeChunks(1, 2));
      vi.spyOn(provider, "batchEmbed").mockRejectedValueOnce(new RateLimitedError("slow down", 1));

      const summary = await ingest(deps, { retry: noWait });

      expect(summary.chunksEmbedded).toBe(2);
      expect(summary.failedBatches).toEqual([]);
      const retries = events.ofType("embed.retry");
      expect(retries).toHaveLength(1);
      expect(retries[0]?.data).toEqual({ batch: 0, attempt: 1, delayMs: 10, error: "slow down" });
      expect(events.ofType("embed.batch")[0]?.data).toMatchObject({ batch: 0, attempts: 2 });
    });

    it("records a batch that keeps failing and carries on", async () => {
      const chunks = makeChunks(3, 2);
      const { deps, provider, store, events } = setup(chunks);
      const failure = new ExternalServiceError("upstream down", "deterministic", { statusCode: 503 });
      const batchEmbed = vi
        .spyOn(provider, "batchEmbed")
        .mockRejectedValueOnce(failure)
        .mockRejectedValueOnce(failure);

      const summary = await ingest(deps, { batchSize: 2, retry: { ...noWait, maxAttempts: 2 } });

      expect(summary.batches).toBe(3);
      expect(summary.failedBatches).toEqual([
        { index: 0, chunkIds: ["d0:0000", "d0:0001"], docIds: ["d0"], attempts: 2, error: "upstream down" },
      ]);
      expect(summary.failedDocIds).toEqual(["d0"]);
      expect(summary.chunksEmbedded).toBe(4);
      expect(await store.countEmbeddings()).toBe(4);
      expect(events.ofType("embed.batch_failed")).toHaveLength(1);

      batchEmbed.mockRestore();
      const resumed = await ingest(deps, { batchSize: 2 });
      expect(resumed.chunksUnchanged).toBe(4);
      expect(resumed.chunksEmbedded).toBe(2);
      expect(resumed.rowsInserted).toBe(2);
      expect(await store.countEmbeddings()).toBe(6);
    });

    it("does not retry client errors", async () => {
      const { deps, provider } = setup(makeChunks(1, 1));
      const batchEmbed = vi
        .spyOn(provider, "batchEmbed")
        .mockRejectedValue(new ExternalServiceError("bad request", "deterministic", { statusCode: 400 }));

      const summary = await ingest(deps, { retry: noWait });

      expect(batchEmbed).toHaveBeenCalledTimes(1);
      expect(summary.failedBatches[0]?.attempts).toBe(1);
    });

    it("fails a batch when the provider returns too few vectors", async () => {
      const { deps, provider } = setup(makeChunks(1, 2));
      vi.spyOn(provider, "batchEmbed").mockResolvedValue({
        embeddings: [provider.vectorFor("only one")],
        model: "deterministic-v1",
        tokensUsed: 2,
        dimensions: 8,
      });

      const summary = await ingest(deps, { retry: { ...noWait, maxAttempts: 1 } });

      expect(summary.failedBatches[0]?.error).toBe("Provider returned 1 vectors for 2 texts");
      expect(summary.chunksEmbedded).toBe(0);
    });
  });

  it("stops between batches when cancelled", async () => {
    const controller = new AbortController();
    const inner = new DeterministicEmbeddingProvider({ dimensions: 8 });
    const { deps, provider, events } = setup(makeChunks(3, 2));
    vi.spyOn(provider, "batchEmbed").mockImplementation(async (texts) => {
      controller.abort();
      return inner.batchEmbed(texts);
    });

    const summary = await ingest(deps, { batchSize: 2, signal: controller.signal });

    expect(summary.cancelled).toBe(true);
    expect(summary.batches).toBe(1);
    expect(summary.chunksEmbedded).toBe(2);
    expect(events.ofType("embed.cancelled")[0]?.data).toEqual({ nextBatch: 1 });
  });

  describe("dry run", () => {
    it("estimates tokens without calling the provider or writing", async () => {
      const { deps, provider, store } = setup(makeChunks(2, 3));
      const batchEmbed = vi.spyOn(provider, "batchEmbed");

      const summary = await ingest(deps, { dryRun: true });

      expect(summary.dryRun).toBe(true);
      expect(summary.estimatedTokens).toBe(60);
      expect(summary.chunksEmbedded).toBe(0);
      expect(batchEmbed).not.toHaveBeenCalled();
      expect(store.writes).toBe(0);
    });

    it("skips the probe for a provider that declares no width", async () => {
      const inner = new DeterministicEmbeddingProvider({ dimensions: 8 });
      const embed = vi.fn((text: string) => inner.embed(text));
      const undeclared: IEmbeddingProvider = {
        name: "deterministic",
        model: "deterministic-v1",
        embed,
        batchEmbed: (texts) => inner.batchEmbed(texts),
        healthCheck: () => inner.healthCheck(),
      };
      const { deps } = setup(makeChunks(1, 2), { embeddingProvider: undeclared });

      const summary = await ingest(deps, { dryRun: true });

      expect(summary.dimension).toBe(8);
      expect(embed).not.toHaveBeenCalled();
    });
  });

  it("limits the run to maxChunks after the skip list", async () => {
    const { deps } = setup(makeChunks(3, 4), { preflight: readyReport(["d0"]) });

    const summary = await ingest(deps, { maxChunks: 3 });

    expect(summary.chunksTotal).toBe(12);
    expect(summary.chunksSkipped).toBe(4);
    expect(summary.chunksEmbedded).toBe(3);
  });

  it("emits start and complete events", async () => {
    const { deps, events } = setup(makeChunks(1, 1));

    await ingest(deps);

    expect(events.events.map((event) => event.type)).toEqual(["embed.start", "embed.batch", "embed.complete"]);
    expect(events.ofType("embed.start")[0]?.data).toEqual({
      provider: "deterministic",
      model: "deterministic-v1",
      dimension: 8,
      dryRun: false,
      batchSize: 128,
    });
  });
});
