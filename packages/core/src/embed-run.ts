import type { EventSink, IngestionSummary, PreflightReport } from "@corpora/types";
import { RunArtifacts } from "@corpora/artifacts";
import type { IEmbeddingProvider } from "@corpora/embeddings";
import type { IVectorStore } from "@corpora/vector-store";
import type { Logger } from "@corpora/logger";
import { ingest, type IngestionOptions } from "./ingestion-pipeline.js";
import { runChunkSource } from "./materialized-chunks.js";

export interface EmbedRunDependencies {
  runsDir: string;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  events?: EventSink;
  logger?: Logger;
}

/**
 * Embed one run from its directory: the preflight report on disk (unless
 * one is passed in) gates the run, and the summary lands in
 * `embed/summary.json`.
 */
export async function embedRun(
  runId: string,
  deps: EmbedRunDependencies,
  options: IngestionOptions & { preflight?: PreflightReport } = {},
): Promise<IngestionSummary> {
  const artifacts = new RunArtifacts(deps.runsDir, runId);
  const { preflight, ...ingestionOptions } = options;

  const summary = await ingest(
    {
      source: runChunkSource(artifacts),
      preflight: preflight ?? (await artifacts.readPreflight()),
      embeddingProvider: deps.embeddingProvider,
      vectorStore: deps.vectorStore,
      events: deps.events,
      logger: deps.logger,
    },
    ingestionOptions,
  );

  await artifacts.writeSummary(summary);
  return summary;
}
