import type { ChunkType } from "@corpora/types";
import type { Piece, SplitContext } from "./piece.js";

const BOILERPLATE_HEADING = /^(references|see also|notes|todo|tbd|related( pages)?)\s*:?$/i;

/** A lone heading line, or a boilerplate heading such as "See also". */
export function isOrphanHeading(piece: Piece): boolean {
  const text = piece.text.trim();
  if (text.includes("\n")) return false;
  return /^#{1,6}\s+\S/.test(text) || BOILERPLATE_HEADING.test(text.replace(/^#+\s*/, ""));
}

function mergePieces(ctx: SplitContext, a: Piece, b: Piece): Piece {
  const verbatim = a.verbatim && b.verbatim && b.start >= a.start;
  const text = verbatim ? ctx.body.slice(a.start, b.end) : `${a.text}\n\n${b.text}`;
  const dominant = b.tokens > a.tokens ? b : a;
  const chunkType: ChunkType = a.chunkType === "heading" && isOrphanHeading(a) ? "heading" : dominant.chunkType;

  return {
    start: Math.min(a.start, b.start),
    end: Math.max(a.end, b.end),
    text,
    tokens: ctx.tokenizer.count(text),
    chunkType,
    strategy: dominant.strategy,
    verbatim,
    atomic: a.atomic && b.atomic,
    truncated: a.truncated || b.truncated,
    glued: a.glued + b.glued + 1,
    digest: a.digest ?? b.digest,
  };
}

function tryMerge(ctx: SplitContext, a: Piece, b: Piece): Piece | undefined {
  const merged = mergePieces(ctx, a, b);
  return merged.tokens <= ctx.config.hardMaxTokens ? merged : undefined;
}

function needsGlue(ctx: SplitContext, piece: Piece): boolean {
  return piece.tokens < ctx.config.softMinTokens || isOrphanHeading(piece);
}

/**
 * Merge pieces under `softMinTokens` (and orphan headings) into a neighbour
 * without crossing `hardMaxTokens`: the following piece first, then the
 * preceding one. Repeats until nothing else can merge.
 */
export function gluePieces(ctx: SplitContext, input: Piece[]): Piece[] {
  const pieces = [...input];
  let changed = true;

  while (changed) {
    changed = false;
    for (let i = 0; i < pieces.length; i++) {
      const piece = pieces[i];
      if (!piece || !needsGlue(ctx, piece)) continue;

      const next = pieces[i + 1];
      const withNext = next ? tryMerge(ctx, piece, next) : undefined;
      if (withNext) {
        pieces.splice(i, 2, withNext);
        changed = true;
        break;
      }

      const previous = pieces[i - 1];
      const withPrevious = previous ? tryMerge(ctx, previous, piece) : undefined;
      if (withPrevious) {
        pieces.splice(i - 1, 2, withPrevious);
        changed = true;
        break;
      }
    }
  }

  return pieces;
}
