import type {
  EmbeddingConfig,
  EventSink,
  PreflightConfig,
  PreflightReason,
  PreflightReport,
  PreflightStatus,
} from "@corpora/types";
import type { RunArtifacts } from "@corpora/artifacts";
import { validateEmbeddingConfig } from "@corpora/config";
import { PreflightBlockedError, errorMessage } from "@corpora/errors";
import { createEvent, createSilentLogger, NoopEventSink, type Logger } from "@corpora/logger";
import { isTokenizerName } from "@corpora/tokenizer";

/**
 * PENDING until a report is recorded, then READY or BLOCKED. Both outcomes
 * are final for the gate; correcting a run means running preflight again.
 */
export class PreflightGate {
  private current: PreflightStatus = "PENDING";
  private recorded?: PreflightReport;

  static fromReport(report: PreflightReport | undefined): PreflightGate {
    const gate = new PreflightGate();
    if (report) gate.record(report);
    return gate;
  }

  get status(): PreflightStatus {
    return this.current;
  }

  get report(): PreflightReport | undefined {
    return this.recorded;
  }

  record(report: PreflightReport): void {
    if (this.current !== "PENDING") {
      throw new Error(`Preflight already ${this.current} for run ${report.runId}`);
    }
    this.current = report.status;
    this.recorded = report;
  }

  /** The READY report, or PreflightBlockedError naming the reasons. */
  assertReady(): PreflightReport {
    if (this.current === "READY" && this.recorded) return this.recorded;
    throw new PreflightBlockedError(this.recorded?.reasons ?? [], {
      runId: this.recorded?.runId,
    });
  }
}

export interface PreflightSettings {
  embedding: EmbeddingConfig;
  tokenizer: string;
  preflight: PreflightConfig;
}

export interface PreflightDependencies {
  artifacts: RunArtifacts;
  events?: EventSink;
  logger?: Logger;
  /** Defaults to the tokenizers this build ships. */
  isTokenizerAvailable?: (name: string) => boolean;
}

interface EmbeddableCount {
  total: number;
  embeddable: number;
  skipList: string[];
}

async function countEmbeddable(artifacts: RunArtifacts, minQuality: number): Promise<EmbeddableCount> {
  let total = 0;
  let embeddable = 0;
  const skipList: string[] = [];
  for await (const doc of artifacts.streamEnriched()) {
    total += 1;
    if (doc.qualityScore >= minQuality) embeddable += 1;
    else skipList.push(doc.docId);
  }
  return { total, embeddable, skipList };
}

/**
 * Decide whether a run may be embedded. Only structural problems block:
 * missing enriched text or chunks, an unknown tokenizer, invalid embedding
 * settings, or too few embeddable documents. Documents under the quality
 * threshold are put on the skip list and reported, never blocking.
 */
export async function runPreflight(
  settings: PreflightSettings,
  deps: PreflightDependencies,
): Promise<PreflightReport> {
  const { artifacts } = deps;
  const events = deps.events ?? new NoopEventSink();
  const logger = (deps.logger ?? createSilentLogger()).child({
    runId: artifacts.runId,
    stage: "preflight",
  });
  const tokenizerAvailable = deps.isTokenizerAvailable ?? isTokenizerName;

  const reasons: PreflightReason[] = [];
  const configIssues: string[] = [];

  const hasEnriched = await artifacts.hasEnriched();
  const hasChunks = await artifacts.hasChunks();
  if (!hasEnriched) reasons.push("MISSING_ENRICH");
  if (!hasChunks) reasons.push("MISSING_CHUNKS");

  const tokenizerOk = tokenizerAvailable(settings.tokenizer);
  if (!tokenizerOk) {
    reasons.push("TOKENIZER_MISSING");
    configIssues.push(`tokenizer "${settings.tokenizer}" is not available`);
  }

  const embeddingIssues = validateEmbeddingConfig(settings.embedding);
  if (embeddingIssues.length > 0) {
    reasons.push("CONFIG_INVALID");
    configIssues.push(...embeddingIssues);
  }

  let counts: EmbeddableCount = { total: 0, embeddable: 0, skipList: [] };
  let enrichedReadable = hasEnriched;
  if (hasEnriched) {
    try {
      counts = await countEmbeddable(artifacts, settings.preflight.minQuality);
    } catch (error: unknown) {
      enrichedReadable = false;
      reasons.push("MISSING_ENRICH");
      configIssues.push(`enriched records unreadable: ${errorMessage(error)}`);
    }
  }
  if (enrichedReadable && counts.embeddable < settings.preflight.minEmbedDocs) {
    reasons.push("EMBEDDABLE_DOCS_ZERO");
  }

  const report: PreflightReport = {
    runId: artifacts.runId,
    status: reasons.length === 0 ? "READY" : "BLOCKED",
    reasons,
    embeddableDocs: counts.embeddable,
    belowThresholdPct: counts.total === 0 ? 0 : counts.skipList.length / counts.total,
    skipList: counts.skipList,
    provider: settings.embedding.provider,
    model: settings.embedding.model,
    dimension: settings.embedding.dimension,
    docTotals: {
      all: counts.total,
      embeddable: counts.embeddable,
      skipped: counts.skipList.length,
    },
    artifacts: {
      enriched: enrichedReadable,
      chunks: hasChunks,
      tokenizer: tokenizerOk,
      config: embeddingIssues.length === 0,
    },
    configIssues,
    timestamp: new Date().toISOString(),
  };

  await artifacts.writePreflight(report, settings.preflight.minQuality);

  events.emit(
    createEvent(
      "preflight.complete",
      {
        status: report.status,
        reasons: report.reasons,
        embeddableDocs: report.embeddableDocs,
        skipped: report.docTotals.skipped,
        belowThresholdPct: report.belowThresholdPct,
      },
      artifacts.runId,
    ),
  );

  if (report.status === "BLOCKED") {
    logger.warn({ reasons, configIssues }, "Preflight blocked");
  } else {
    logger.info(
      { embeddableDocs: report.embeddableDocs, skipped: report.docTotals.skipped },
      "Preflight ready",
    );
  }

  return report;
}
