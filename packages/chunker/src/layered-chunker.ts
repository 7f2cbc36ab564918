import type {
  Chunk,
  ChunkMeta,
  ChunkingConfig,
  EventSink,
  SourceDocument,
} from "@corpora/types";
import { ValidationError } from "@corpora/errors";
import { createEvent, NoopEventSink } from "@corpora/logger";
import type { ITokenizer } from "@corpora/tokenizer";
import type { DocumentChunks, IChunker } from "./chunker.interface.js";
import { isHeadingLine, parseBlocks, sectionBoundaries, sectionsOf } from "./blocks.js";
import { calculateCoverage } from "./coverage.js";
import { DocumentSkipError } from "./errors.js";
import { gluePieces } from "./glue.js";
import { fits, slicePiece, type Piece, type SplitContext } from "./piece.js";
import { trimSpan, type Span } from "./spans.js";
import { blockType, splitBlocks } from "./splitters.js";

export const TRUNCATION_MARKER = "\n[TRUNCATED]";

export interface LayeredChunkerDeps {
  tokenizer: ITokenizer;
  events?: EventSink;
  runId?: string;
}

export function validateChunkingConfig(config: ChunkingConfig): void {
  const fields: Record<string, string> = {};
  if (config.hardMaxTokens < 16) fields["hardMaxTokens"] = "must be at least 16";
  if (config.overlapTokens >= config.hardMaxTokens / 2) {
    fields["overlapTokens"] = "must be less than half of hardMaxTokens";
  }
  if (config.hardMinTokens > config.softMinTokens) fields["hardMinTokens"] = "must not exceed softMinTokens";
  if (config.softMinTokens > config.hardMaxTokens) fields["softMinTokens"] = "must not exceed hardMaxTokens";
  if (Object.keys(fields).length > 0) {
    throw new ValidationError("Invalid chunking configuration", fields);
  }
}

export function chunkIdFor(docId: string, ordinal: number): string {
  return `${docId}:${String(ordinal).padStart(4, "0")}`;
}

/**
 * Splits a document by headings, then paragraphs (code and tables kept
 * whole), then sentences, code lines or table rows, then word windows, with
 * a binary-search cut as the last resort. Small pieces are glued afterwards.
 */
export class LayeredChunker implements IChunker {
  readonly strategy = "layered";
  private readonly events: EventSink;

  constructor(private readonly deps: LayeredChunkerDeps) {
    this.events = deps.events ?? new NoopEventSink();
  }

  chunk(document: SourceDocument, config: ChunkingConfig): DocumentChunks {
    validateChunkingConfig(config);

    const docId = document.docId.trim();
    if (docId.length === 0) {
      throw new DocumentSkipError("MISSING_DOC_ID", "", "Document has no doc_id");
    }
    if (
      document.sourceSystem.trim().length === 0 ||
      (document.title.trim().length === 0 && document.url.trim().length === 0)
    ) {
      throw new DocumentSkipError(
        "MISSING_TRACEABILITY",
        docId,
        `Document ${docId} needs a source system and a title or url`,
      );
    }

    const body = document.bodyText;
    const whole = trimSpan(body, 0, body.length);
    if (whole.end <= whole.start) {
      throw new DocumentSkipError("EMPTY_BODY", docId, `Document ${docId} has no text`);
    }

    const ctx: SplitContext = {
      body,
      docId,
      runId: this.deps.runId,
      tokenizer: this.deps.tokenizer,
      config,
      events: this.events,
    };

    const split = this.split(ctx, document, whole).map((piece) => this.enforceHardCap(ctx, piece));
    const pieces = gluePieces(ctx, split);

    const coverage = calculateCoverage(body, pieces);
    const exempt = pieces.some((piece) => piece.digest !== undefined || piece.truncated);
    if (coverage.coveragePct < config.minCoveragePct && !exempt) {
      throw new DocumentSkipError(
        "LOW_COVERAGE",
        docId,
        `Document ${docId} coverage ${String(coverage.coveragePct)}% is below ${String(config.minCoveragePct)}%`,
      );
    }

    const chunks = pieces.map((piece, ordinal) =>
      this.toChunk(document, docId, piece, ordinal, pieces.length, config),
    );

    this.events.emit(
      createEvent(
        "chunk.doc",
        { docId, chunks: chunks.length, coveragePct: coverage.coveragePct, exempt },
        this.deps.runId,
      ),
    );

    return { chunks, coverage: { docId, ...coverage, exempt } };
  }

  private split(ctx: SplitContext, document: SourceDocument, whole: Span): Piece[] {
    const { body } = ctx;
    if (fits(ctx, whole.start, whole.end)) {
      const type = blockType(parseBlocks(body, whole.start, whole.end));
      const atomic = type === "code" || type === "table";
      return [slicePiece(ctx, whole.start, whole.end, type, "no-split", atomic)];
    }

    const sections = sectionsOf(body, sectionBoundaries(body, document.sectionMap));
    if (sections.length <= 1) {
      return splitBlocks(ctx, whole.start, whole.end);
    }

    const pieces: Piece[] = [];
    for (const section of sections) {
      const span = trimSpan(body, section.start, section.end);
      if (span.end <= span.start) continue;
      if (fits(ctx, span.start, span.end)) {
        const newline = body.indexOf("\n", span.start);
        const firstLine = body.slice(span.start, newline === -1 || newline > span.end ? span.end : newline);
        const type = isHeadingLine(firstLine) ? "heading" : "paragraph";
        pieces.push(slicePiece(ctx, span.start, span.end, type, "heading"));
      } else {
        pieces.push(...splitBlocks(ctx, span.start, span.end));
      }
    }
    return pieces;
  }

  /** Last-resort guarantee for pieces whose rendered text outgrew the cap. */
  private enforceHardCap(ctx: SplitContext, piece: Piece): Piece {
    const hardMax = ctx.config.hardMaxTokens;
    if (piece.tokens <= hardMax) return piece;

    const { tokenizer } = ctx;
    let keep = tokenizer.fitPrefix(piece.text, hardMax - tokenizer.count(TRUNCATION_MARKER));
    let text = `${piece.text.slice(0, keep)}${TRUNCATION_MARKER}`;
    while (keep > 0 && tokenizer.count(text) > hardMax) {
      keep -= 1;
      text = `${piece.text.slice(0, keep)}${TRUNCATION_MARKER}`;
    }

    this.events.emit(
      createEvent(
        "chunk.force_truncate",
        {
          docId: ctx.docId,
          charStart: piece.start,
          charEnd: piece.end,
          reason: "rendered-over-budget",
          tokensBefore: piece.tokens,
          hardMaxTokens: hardMax,
        },
        ctx.runId,
      ),
    );

    return {
      ...piece,
      text,
      tokens: tokenizer.count(text),
      strategy: "force-truncate",
      verbatim: false,
      truncated: true,
    };
  }

  private toChunk(
    document: SourceDocument,
    docId: string,
    piece: Piece,
    ordinal: number,
    total: number,
    config: ChunkingConfig,
  ): Chunk {
    const meta: ChunkMeta = {};
    if (piece.tokens < config.hardMinTokens) {
      meta.belowMinReason = total === 1 ? "document-size" : piece.atomic ? "indivisible-block" : "no-room";
    }
    if (piece.digest) meta.digest = piece.digest;
    if (piece.glued > 0) meta.gluedPieces = piece.glued + 1;

    return {
      chunkId: chunkIdFor(docId, ordinal),
      docId,
      ordinal,
      text: piece.text,
      tokenCount: piece.tokens,
      charStart: piece.start,
      charEnd: piece.end,
      chunkType: piece.chunkType,
      splitStrategy: piece.glued > 0 ? `${piece.strategy}+glue` : piece.strategy,
      traceability: {
        title: document.title,
        url: document.url,
        sourceSystem: document.sourceSystem,
      },
      ...(Object.keys(meta).length > 0 ? { meta } : {}),
    };
  }
}
