import { z } from "zod";
import type {
  BaseSplitStrategy,
  Chunk,
  ChunkMeta,
  EnrichedDocument,
  IngestionSummary,
  PreflightReason,
  PreflightReport,
  SplitStrategy,
} from "@corpora/types";

const BASE_STRATEGIES: readonly BaseSplitStrategy[] = [
  "no-split",
  "heading",
  "paragraph",
  "sentence",
  "code-fence-lines",
  "code-digest",
  "table-rows",
  "token-window",
  "force-truncate",
];

export function isSplitStrategy(value: unknown): value is SplitStrategy {
  if (typeof value !== "string") return false;
  const base = value.endsWith("+glue") ? value.slice(0, -"+glue".length) : value;
  return BASE_STRATEGIES.some((strategy) => strategy === base);
}

// ── Chunk record (chunks.ndjson) ───────────────────────────────

export const chunkRecordSchema = z
  .object({
    chunk_id: z.string().min(1),
    doc_id: z.string().min(1),
    ordinal: z.number().int().nonnegative(),
    text: z.string(),
    token_count: z.number().int().nonnegative(),
    char_start: z.number().int().nonnegative(),
    char_end: z.number().int().nonnegative(),
    chunk_type: z.enum(["heading", "paragraph", "sentence", "code", "table", "token-window"]),
    split_strategy: z.custom<SplitStrategy>(isSplitStrategy, { message: "unknown split strategy" }),
    traceability: z.object({
      title: z.string(),
      url: z.string(),
      source_system: z.string(),
    }),
    meta: z
      .object({
        below_min_reason: z.enum(["document-size", "indivisible-block", "no-room"]).optional(),
        digest: z
          .object({
            language: z.string(),
            symbols: z.array(z.string()),
            original_tokens: z.number().int().nonnegative(),
          })
          .optional(),
        glued_pieces: z.number().int().positive().optional(),
      })
      .optional(),
  })
  .refine((record) => record.char_start < record.char_end, {
    message: "char_start must be below char_end",
    path: ["char_start"],
  });

export type ChunkRecord = z.infer<typeof chunkRecordSchema>;

export function chunkToRecord(chunk: Chunk): ChunkRecord {
  const record: ChunkRecord = {
    chunk_id: chunk.chunkId,
    doc_id: chunk.docId,
    ordinal: chunk.ordinal,
    text: chunk.text,
    token_count: chunk.tokenCount,
    char_start: chunk.charStart,
    char_end: chunk.charEnd,
    chunk_type: chunk.chunkType,
    split_strategy: chunk.splitStrategy,
    traceability: {
      title: chunk.traceability.title,
      url: chunk.traceability.url,
      source_system: chunk.traceability.sourceSystem,
    },
  };
  const meta = chunk.meta;
  if (meta && Object.keys(meta).length > 0) {
    record.meta = {
      ...(meta.belowMinReason ? { below_min_reason: meta.belowMinReason } : {}),
      ...(meta.digest
        ? {
            digest: {
              language: meta.digest.language,
              symbols: meta.digest.symbols,
              original_tokens: meta.digest.originalTokens,
            },
          }
        : {}),
      ...(meta.gluedPieces !== undefined ? { glued_pieces: meta.gluedPieces } : {}),
    };
  }
  return record;
}

export function chunkFromRecord(record: ChunkRecord): Chunk {
  const chunk: Chunk = {
    chunkId: record.chunk_id,
    docId: record.doc_id,
    ordinal: record.ordinal,
    text: record.text,
    tokenCount: record.token_count,
    charStart: record.char_start,
    charEnd: record.char_end,
    chunkType: record.chunk_type,
    splitStrategy: record.split_strategy,
    traceability: {
      title: record.traceability.title,
      url: record.traceability.url,
      sourceSystem: record.traceability.source_system,
    },
  };
  if (record.meta) {
    const meta: ChunkMeta = {};
    if (record.meta.below_min_reason) meta.belowMinReason = record.meta.below_min_reason;
    if (record.meta.digest) {
      meta.digest = {
        language: record.meta.digest.language,
        symbols: record.meta.digest.symbols,
        originalTokens: record.meta.digest.original_tokens,
      };
    }
    if (record.meta.glued_pieces !== undefined) meta.gluedPieces = record.meta.glued_pieces;
    chunk.meta = meta;
  }
  return chunk;
}

// ── Enriched document record (enriched.jsonl) ──────────────────

export const enrichedRecordSchema = z.object({
  doc_id: z.string().default(""),
  title: z.string().nullish().transform((v) => v ?? ""),
  url: z.string().nullish().transform((v) => v ?? ""),
  source_system: z.string().nullish().transform((v) => v ?? ""),
  body_text: z.string().nullish().transform((v) => v ?? ""),
  section_map: z
    .array(
      z.object({
        heading: z.string(),
        offset: z.number().int().nonnegative(),
        level: z.number().int().positive().optional(),
      }),
    )
    .optional(),
  quality_score: z.number().min(0).max(1).default(1),
  doctype: z.string().nullish(),
  space_key: z.string().nullish(),
  labels: z.array(z.string()).default([]),
});

export type EnrichedRecord = z.infer<typeof enrichedRecordSchema>;
export type EnrichedRecordInput = z.input<typeof enrichedRecordSchema>;

export function enrichedFromRecord(record: EnrichedRecord): EnrichedDocument {
  return {
    docId: record.doc_id,
    title: record.title,
    url: record.url,
    sourceSystem: record.source_system,
    bodyText: record.body_text,
    ...(record.section_map ? { sectionMap: record.section_map } : {}),
    qualityScore: record.quality_score,
    ...(record.doctype ? { doctype: record.doctype } : {}),
    ...(record.space_key ? { spaceKey: record.space_key } : {}),
    labels: record.labels,
  };
}

export function enrichedToRecord(doc: EnrichedDocument): EnrichedRecordInput {
  return {
    doc_id: doc.docId,
    title: doc.title,
    url: doc.url,
    source_system: doc.sourceSystem,
    body_text: doc.bodyText,
    ...(doc.sectionMap ? { section_map: doc.sectionMap } : {}),
    quality_score: doc.qualityScore,
    ...(doc.doctype ? { doctype: doc.doctype } : {}),
    ...(doc.spaceKey ? { space_key: doc.spaceKey } : {}),
    labels: doc.labels,
  };
}

// ── Preflight report (preflight.json) ──────────────────────────

const PREFLIGHT_REASONS = [
  "MISSING_ENRICH",
  "MISSING_CHUNKS",
  "TOKENIZER_MISSING",
  "CONFIG_INVALID",
  "EMBEDDABLE_DOCS_ZERO",
] as const satisfies readonly PreflightReason[];

export const preflightRecordSchema = z.object({
  run_id: z.string(),
  status: z.enum(["READY", "BLOCKED"]),
  reasons: z.array(z.enum(PREFLIGHT_REASONS)),
  embeddable_docs: z.number().int().nonnegative(),
  below_threshold_pct: z.number().min(0).max(1),
  skip_list: z.array(z.string()),
  provider: z.string(),
  model: z.string(),
  dimension: z.number().int(),
  doc_totals: z.object({
    all: z.number().int().nonnegative(),
    embeddable: z.number().int().nonnegative(),
    skipped: z.number().int().nonnegative(),
  }),
  artifacts: z.object({
    enriched: z.boolean(),
    chunks: z.boolean(),
    tokenizer: z.boolean(),
    config: z.boolean(),
  }),
  config_issues: z.array(z.string()),
  timestamp: z.string(),
});

export type PreflightRecord = z.infer<typeof preflightRecordSchema>;

export function preflightToRecord(report: PreflightReport): PreflightRecord {
  return {
    run_id: report.runId,
    status: report.status,
    reasons: report.reasons,
    embeddable_docs: report.embeddableDocs,
    below_threshold_pct: report.belowThresholdPct,
    skip_list: report.skipList,
    provider: report.provider,
    model: report.model,
    dimension: report.dimension,
    doc_totals: report.docTotals,
    artifacts: report.artifacts,
    config_issues: report.configIssues,
    timestamp: report.timestamp,
  };
}

export function preflightFromRecord(record: PreflightRecord): PreflightReport {
  return {
    runId: record.run_id,
    status: record.status,
    reasons: record.reasons,
    embeddableDocs: record.embeddable_docs,
    belowThresholdPct: record.below_threshold_pct,
    skipList: record.skip_list,
    provider: record.provider,
    model: record.model,
    dimension: record.dimension,
    docTotals: record.doc_totals,
    artifacts: record.artifacts,
    configIssues: record.config_issues,
    timestamp: record.timestamp,
  };
}

// ── Skip list (doc_skiplist.json) ──────────────────────────────

export const skiplistRecordSchema = z.object({
  skip: z.array(z.string()),
  reason: z.literal("quality_below_min"),
  min_quality: z.number(),
  total_docs: z.number().int().nonnegative(),
  skipped_count: z.number().int().nonnegative(),
});

export type SkiplistRecord = z.infer<typeof skiplistRecordSchema>;

// ── Ingestion summary (embed/summary.json) ─────────────────────

export function summaryToRecord(summary: IngestionSummary): Record<string, unknown> {
  return {
    run_id: summary.runId,
    provider: summary.provider,
    model: summary.model,
    dimension: summary.dimension,
    dry_run: summary.dryRun,
    cancelled: summary.cancelled,
    chunks_total: summary.chunksTotal,
    chunks_skipped: summary.chunksSkipped,
    chunks_unchanged: summary.chunksUnchanged,
    chunks_embedded: summary.chunksEmbedded,
    rows_inserted: summary.rowsInserted,
    rows_updated: summary.rowsUpdated,
    batches: summary.batches,
    failed_batches: summary.failedBatches.map((batch) => ({
      index: batch.index,
      chunk_ids: batch.chunkIds,
      doc_ids: batch.docIds,
      attempts: batch.attempts,
      error: batch.error,
    })),
    failed_doc_ids: summary.failedDocIds,
    ...(summary.estimatedTokens !== undefined ? { estimated_tokens: summary.estimatedTokens } : {}),
    duration_ms: summary.durationMs,
  };
}
