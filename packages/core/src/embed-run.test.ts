import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Chunk, EnrichedDocument } from "@corpora/types";
import { RunArtifacts } from "@corpora/artifacts";
import { DeterministicEmbeddingProvider } from "@corpora/embeddings";
import { MemoryVectorStore } from "@corpora/vector-store";
import { embedRun } from "./embed-run.js";
import { runPreflight } from "./preflight.js";

function doc(docId: string, qualityScore: number, spaceKey: string): EnrichedDocument {
  return {
    docId,
    title: `Title ${docId}`,
    url: `https://wiki.example.test/${docId}`,
    sourceSystem: "confluence",
    bodyText: `Body of ${docId}.`,
    qualityScore,
    spaceKey,
    labels: [],
  };
}

function chunkOf(docId: string, ordinal: number): Chunk {
  const text = `Section ${String(ordinal)} of ${docId}.`;
  return {
    chunkId: `${docId}:${String(ordinal).padStart(4, "0")}`,
    docId,
    ordinal,
    text,
    tokenCount: 6,
    charStart: ordinal * 50,
    charEnd: ordinal * 50 + text.length,
    chunkType: "paragraph",
    splitStrategy: "paragraph",
    traceability: { title: `Title ${docId}`, url: `https://wiki.example.test/${docId}`, sourceSystem: "confluence" },
  };
}

describe("embedRun", () => {
  let runsDir: string;
  let artifacts: RunArtifacts;

  beforeEach(async () => {
    runsDir = await mkdtemp(join(tmpdir(), "corpora-embed-"));
    artifacts = new RunArtifacts(runsDir, "run-7");
    await artifacts.writeEnriched([doc("d1", 0.9, "N2S"), doc("d2", 0.2, "HR")]);
    await artifacts.writeChunks([chunkOf("d1", 0), chunkOf("d1", 1), chunkOf("d2", 0)]);
  });

  afterEach(async () => {
    await rm(runsDir, { recursive: true, force: true });
  });

  it("embeds a run gated by the preflight report on disk", async () => {
    await runPreflight(
      {
        embedding: {
          provider: "deterministic",
          model: "deterministic-v1",
          dimension: 16,
          batchSize: 128,
          retry: { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 1 },
        },
        tokenizer: "heuristic",
        preflight: { minEmbedDocs: 1, minQuality: 0.5 },
      },
      { artifacts },
    );
    const store = new MemoryVectorStore({ dimension: 16 });

    const summary = await embedRun("run-7", {
      runsDir,
      embeddingProvider: new DeterministicEmbeddingProvider({ dimensions: 16 }),
      vectorStore: store,
    });

    expect(summary.chunksSkipped).toBe(1);
    expect(summary.chunksEmbedded).toBe(2);
    expect(store.documents.get("d1")?.spaceKey).toBe("N2S");

    const written: unknown = JSON.parse(await readFile(artifacts.paths.embedSummary, "utf8"));
    expect(written).toMatchObject({
      run_id: "run-7",
      provider: "deterministic",
      chunks_total: 3,
      chunks_skipped: 1,
      chunks_embedded: 2,
      rows_inserted: 2,
      failed_batches: [],
    });
  });

  it("refuses a run that has no preflight report", async () => {
    const store = new MemoryVectorStore({ dimension: 16 });

    await expect(
      embedRun("run-7", {
        runsDir,
        embeddingProvider: new DeterministicEmbeddingProvider({ dimensions: 16 }),
        vectorStore: store,
      }),
    ).rejects.toThrow("Preflight blocked: not run");
    expect(store.writes).toBe(0);
  });
});
