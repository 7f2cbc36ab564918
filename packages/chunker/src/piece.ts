import type {
  BaseSplitStrategy,
  ChunkType,
  ChunkingConfig,
  CodeDigestMeta,
  EventSink,
} from "@corpora/types";
import type { ITokenizer } from "@corpora/tokenizer";
import { isWhitespace, trimSpan } from "./spans.js";

/** A chunk before ids are assigned. `start`/`end` index the document body. */
export interface Piece {
  start: number;
  end: number;
  text: string;
  tokens: number;
  chunkType: ChunkType;
  strategy: BaseSplitStrategy;
  /** `text` equals body.slice(start, end). */
  verbatim: boolean;
  /** Code or table content that may not be split further. */
  atomic: boolean;
  truncated: boolean;
  glued: number;
  digest?: CodeDigestMeta;
}

export interface SplitContext {
  body: string;
  docId: string;
  runId?: string;
  tokenizer: ITokenizer;
  config: ChunkingConfig;
  events: EventSink;
}

export function countTokens(ctx: SplitContext, start: number, end: number): number {
  return ctx.tokenizer.count(ctx.body.slice(start, end));
}

export function fits(ctx: SplitContext, start: number, end: number): boolean {
  return countTokens(ctx, start, end) <= ctx.config.hardMaxTokens;
}

export function slicePiece(
  ctx: SplitContext,
  start: number,
  end: number,
  chunkType: ChunkType,
  strategy: BaseSplitStrategy,
  atomic = false,
): Piece {
  const text = ctx.body.slice(start, end);
  return {
    start,
    end,
    text,
    tokens: ctx.tokenizer.count(text),
    chunkType,
    strategy,
    verbatim: true,
    atomic,
    truncated: false,
    glued: 0,
  };
}

/**
 * Start of the trailing overlap of [prevStart, prevEnd): the earliest word
 * start whose tail holds at most `overlapTokens`. Returns `prevEnd` when
 * no overlap applies.
 */
export function overlapStart(ctx: SplitContext, prevStart: number, prevEnd: number): number {
  const budget = ctx.config.overlapTokens;
  if (budget <= 0 || prevEnd <= prevStart) return prevEnd;

  let lo = prevStart;
  let hi = prevEnd;
  while (lo < hi) {
    const mid = Math.floor((lo + hi) / 2);
    if (countTokens(ctx, mid, prevEnd) <= budget) hi = mid;
    else lo = mid + 1;
  }

  let start = lo;
  // Snap forward to the next word start.
  if (start > prevStart && !isWhitespace(ctx.body[start - 1])) {
    while (start < prevEnd && !isWhitespace(ctx.body[start])) start++;
  }
  start = trimSpan(ctx.body, start, prevEnd).start;

  return start <= prevStart || start >= prevEnd ? prevEnd : start;
}
