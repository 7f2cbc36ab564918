import type {
  Chunk,
  ChunkRunResult,
  ChunkSkip,
  ChunkingConfig,
  DocumentCoverage,
  EventSink,
  SourceDocument,
} from "@corpora/types";
import { errorMessage } from "@corpora/errors";
import { createEvent, createSilentLogger, NoopEventSink, type Logger } from "@corpora/logger";
import type { ITokenizer } from "@corpora/tokenizer";
import { buildChunkAssurance } from "./assurance.js";
import type { IChunker } from "./chunker.interface.js";
import { DocumentSkipError } from "./errors.js";
import { LayeredChunker, validateChunkingConfig } from "./layered-chunker.js";

export interface ChunkDocumentsOptions {
  tokenizer: ITokenizer;
  events?: EventSink;
  logger?: Logger;
  runId?: string;
  chunker?: IChunker;
}

/**
 * Chunk a batch of documents. A document that cannot be chunked is recorded
 * in `skipped` with its reason and the batch continues. An invalid `config`
 * throws a ValidationError before anything is emitted.
 */
export function chunkDocuments(
  documents: Iterable<SourceDocument>,
  config: ChunkingConfig,
  options: ChunkDocumentsOptions,
): ChunkRunResult {
  validateChunkingConfig(config);
  const events = options.events ?? new NoopEventSink();
  const logger = options.logger ?? createSilentLogger();
  const chunker =
    options.chunker ??
    new LayeredChunker({ tokenizer: options.tokenizer, events, runId: options.runId });

  const chunks: Chunk[] = [];
  const skipped: ChunkSkip[] = [];
  const coverage: DocumentCoverage[] = [];
  let docCount = 0;

  events.emit(createEvent("chunk.start", { config }, options.runId));

  for (const document of documents) {
    docCount++;
    try {
      const result = chunker.chunk(document, config);
      chunks.push(...result.chunks);
      coverage.push(result.coverage);
    } catch (error: unknown) {
      const skip: ChunkSkip =
        error instanceof DocumentSkipError
          ? { docId: document.docId, reason: error.reason, detail: error.message }
          : { docId: document.docId, reason: "CHUNKING_FAILED", detail: errorMessage(error) };
      skipped.push(skip);
      logger.warn({ docId: skip.docId, reason: skip.reason, err: error }, "document skipped");
      events.emit(createEvent("chunk.skip", { ...skip }, options.runId));
    }
  }

  const assurance = buildChunkAssurance(chunks, config, coverage);

  events.emit(
    createEvent(
      "chunk.complete",
      {
        docs: docCount,
        chunks: chunks.length,
        skipped: skipped.length,
        status: assurance.status,
        tokenStats: assurance.tokenStats,
      },
      options.runId,
    ),
  );
  logger.info(
    { docs: docCount, chunks: chunks.length, skipped: skipped.length, status: assurance.status },
    "chunking complete",
  );

  return { chunks, skipped, coverage, assurance };
}
