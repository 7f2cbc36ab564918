import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Chunk, EnrichedDocument, PreflightReport } from "@corpora/types";
import { fileExists, RunArtifacts } from "@corpora/artifacts";
import { PreflightBlockedError } from "@corpora/errors";
import { MemoryEventSink } from "@corpora/logger";
import { PreflightGate, runPreflight, type PreflightSettings } from "./preflight.js";

const settings: PreflightSettings = {
  embedding: {
    provider: "deterministic",
    model: "deterministic-v1",
    dimension: 1536,
    batchSize: 128,
    retry: { maxRetries: 3, baseDelayMs: 1, maxDelayMs: 2 },
  },
  tokenizer: "heuristic",
  preflight: { minEmbedDocs: 1, minQuality: 0.6 },
};

function doc(docId: string, qualityScore: number): EnrichedDocument {
  return {
    docId,
    title: `Title ${docId}`,
    url: `https://wiki.example.test/${docId}`,
    sourceSystem: "confluence",
    bodyText: `Body of ${docId}.`,
    qualityScore,
    labels: [],
  };
}

function chunkOf(docId: string): Chunk {
  const text = `Body of ${docId}.`;
  return {
    chunkId: `${docId}:0000`,
    docId,
    ordinal: 0,
    text,
    tokenCount: 4,
    charStart: 0,
    charEnd: text.length,
    chunkType: "paragraph",
    splitStrategy: "no-split",
    traceability: { title: `Title ${docId}`, url: `https://wiki.example.test/${docId}`, sourceSystem: "confluence" },
  };
}

describe("runPreflight", () => {
  let runsDir: string;
  let artifacts: RunArtifacts;

  beforeEach(async () => {
    runsDir = await mkdtemp(join(tmpdir(), "corpora-preflight-"));
    artifacts = new RunArtifacts(runsDir, "run-1");
  });

  afterEach(async () => {
    await rm(runsDir, { recursive: true, force: true });
  });

  it("blocks on missing enriched records and names only that reason", async () => {
    await artifacts.writeChunks([chunkOf("d1")]);

    const report = await runPreflight(settings, { artifacts });

    expect(report.status).toBe("BLOCKED");
    expect(report.reasons).toEqual(["MISSING_ENRICH"]);
    expect(report.artifacts).toEqual({ enriched: false, chunks: true, tokenizer: true, config: true });
    expect(await artifacts.readPreflight()).toMatchObject({ status: "BLOCKED", reasons: ["MISSING_ENRICH"] });
  });

  it("puts low-quality documents on the skip list without blocking", async () => {
    await artifacts.writeEnriched([doc("d1", 0.9), doc("d2", 0.5), doc("d3", 0.7)]);
    await artifacts.writeChunks([chunkOf("d1"), chunkOf("d2"), chunkOf("d3")]);
    const events = new MemoryEventSink();

    const report = await runPreflight(settings, { artifacts, events });

    expect(report.status).toBe("READY");
    expect(report.reasons).toEqual([]);
    expect(report.embeddableDocs).toBe(2);
    expect(report.skipList).toEqual(["d2"]);
    expect(report.belowThresholdPct).toBeCloseTo(1 / 3);
    expect(report.docTotals).toEqual({ all: 3, embeddable: 2, skipped: 1 });

    const skiplist: unknown = JSON.parse(await readFile(artifacts.paths.skiplist, "utf8"));
    expect(skiplist).toEqual({
      skip: ["d2"],
      reason: "quality_below_min",
      min_quality: 0.6,
      total_docs: 3,
      skipped_count: 1,
    });
    expect(events.ofType("preflight.complete")).toHaveLength(1);
    expect(events.ofType("preflight.complete")[0]?.data).toMatchObject({ status: "READY", skipped: 1 });
  });

  it("blocks when no document clears the quality bar", async () => {
    await artifacts.writeEnriched([doc("d1", 0.1), doc("d2", 0.2)]);
    await artifacts.writeChunks([chunkOf("d1"), chunkOf("d2")]);

    const report = await runPreflight(settings, { artifacts });

    expect(report.status).toBe("BLOCKED");
    expect(report.reasons).toEqual(["EMBEDDABLE_DOCS_ZERO"]);
    expect(report.skipList).toEqual(["d1", "d2"]);
  });

  it("reports an unknown tokenizer and invalid embedding settings", async () => {
    await artifacts.writeEnriched([doc("d1", 0.9)]);
    await artifacts.writeChunks([chunkOf("d1")]);

    const report = await runPreflight(
      {
        ...settings,
        tokenizer: "sentencepiece",
        embedding: { ...settings.embedding, provider: "openai", model: "text-embedding-3-small" },
      },
      { artifacts },
    );

    expect(report.reasons).toEqual(["TOKENIZER_MISSING", "CONFIG_INVALID"]);
    expect(report.configIssues).toEqual([
      'tokenizer "sentencepiece" is not available',
      "OPENAI_API_KEY is required for provider openai",
    ]);
  });

  it("removes a stale skip list when nothing is skipped", async () => {
    await artifacts.writeEnriched([doc("d1", 0.9), doc("d2", 0.1)]);
    await artifacts.writeChunks([chunkOf("d1")]);
    await runPreflight(settings, { artifacts });
    expect(await fileExists(artifacts.paths.skiplist)).toBe(true);

    await artifacts.writeEnriched([doc("d1", 0.9)]);
    await runPreflight(settings, { artifacts });

    expect(await fileExists(artifacts.paths.skiplist)).toBe(false);
    expect(await artifacts.readSkiplist()).toEqual([]);
  });
});

describe("PreflightGate", () => {
  const ready: PreflightReport = {
    runId: "run-1",
    status: "READY",
    reasons: [],
    embeddableDocs: 1,
    belowThresholdPct: 0,
    skipList: [],
    provider: "deterministic",
    model: "deterministic-v1",
    dimension: 1536,
    docTotals: { all: 1, embeddable: 1, skipped: 0 },
    artifacts: { enriched: true, chunks: true, tokenizer: true, config: true },
    configIssues: [],
    timestamp: "2026-01-01T00:00:00.000Z",
  };

  it("starts pending and refuses to proceed", () => {
    const gate = new PreflightGate();
    expect(gate.status).toBe("PENDING");
    expect(() => gate.assertReady()).toThrow("Preflight blocked: not run");
  });

  it("returns the report once ready", () => {
    expect(PreflightGate.fromReport(ready).assertReady()).toBe(ready);
  });

  it("names the blocking reasons", () => {
    const gate = PreflightGate.fromReport({ ...ready, status: "BLOCKED", reasons: ["MISSING_CHUNKS"] });

    expect(gate.status).toBe("BLOCKED");
    expect(() => gate.assertReady()).toThrow(PreflightBlockedError);
    expect(() => gate.assertReady()).toThrow("Preflight blocked: MISSING_CHUNKS");
  });

  it("records a report only once", () => {
    const gate = PreflightGate.fromReport(ready);
    expect(() => gate.record(ready)).toThrow("Preflight already READY for run run-1");
  });
});
