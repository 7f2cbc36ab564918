import type { BaseSplitStrategy, ChunkType } from "@corpora/types";
import { createEvent } from "@corpora/logger";
import { parseBlocks, type Block } from "./blocks.js";
import { buildCodeDigest } from "./code-digest.js";
import {
  countTokens,
  fits,
  overlapStart,
  slicePiece,
  type Piece,
  type SplitContext,
} from "./piece.js";
import { isWhitespace, linesOf, trimSpan, type Line, type Span } from "./spans.js";

interface PackOptions<U extends Span> {
  strategy: BaseSplitStrategy;
  typeOf: (group: U[]) => ChunkType;
  splitOversized: (unit: U) => Piece[];
  overlapBefore: (first: U) => boolean;
  atomicOf?: (group: U[]) => boolean;
}

/**
 * Greedily pack consecutive units into pieces under the hard cap. Oversized
 * units go to `splitOversized`; packed neighbours share a trailing overlap.
 */
function packUnits<U extends Span>(ctx: SplitContext, units: U[], options: PackOptions<U>): Piece[] {
  const pieces: Piece[] = [];
  let group: U[] = [];
  let previous: Span | undefined;

  const flush = () => {
    const first = group[0];
    const last = group[group.length - 1];
    if (!first || !last) return;

    let start = first.start;
    if (previous && options.overlapBefore(first)) {
      const candidate = overlapStart(ctx, previous.start, previous.end);
      if (candidate < start && fits(ctx, candidate, last.end)) start = candidate;
    }

    pieces.push(
      slicePiece(ctx, start, last.end, options.typeOf(group), options.strategy, options.atomicOf?.(group) ?? false),
    );
    previous = { start: first.start, end: last.end };
    group = [];
  };

  for (const unit of units) {
    if (!fits(ctx, unit.start, unit.end)) {
      flush();
      pieces.push(...options.splitOversized(unit));
      previous = undefined;
      continue;
    }
    const first = group[0];
    if (first && fits(ctx, first.start, unit.end)) {
      group.push(unit);
    } else {
      flush();
      group = [unit];
    }
  }
  flush();

  return pieces;
}

function emitForceTruncate(ctx: SplitContext, start: number, end: number, reason: string): void {
  ctx.events.emit(
    createEvent(
      "chunk.force_truncate",
      { docId: ctx.docId, charStart: start, charEnd: end, reason, hardMaxTokens: ctx.config.hardMaxTokens },
      ctx.runId,
    ),
  );
}

/**
 * End of a window starting at `start`: the last word boundary within the
 * token budget, or a binary-searched mid-word cut when a single word is
 * over budget.
 */
function windowEnd(ctx: SplitContext, start: number, end: number): { end: number; forced: boolean } {
  const fit = start + ctx.tokenizer.fitPrefix(ctx.body.slice(start, end), ctx.config.hardMaxTokens);
  if (fit >= end) return { end, forced: false };

  for (let p = fit; p > start; p--) {
    if (isWhitespace(ctx.body[p])) {
      const trimmed = trimSpan(ctx.body, start, p);
      if (trimmed.end > trimmed.start) return { end: trimmed.end, forced: false };
    }
  }
  return { end: Math.max(fit, start + 1), forced: true };
}

/** Word-level windows over [start, end); the last-resort split. */
export function splitTokenWindows(ctx: SplitContext, start: number, end: number): Piece[] {
  const pieces: Piece[] = [];
  let cursor = trimSpan(ctx.body, start, end).start;
  let previous: Span | undefined;

  while (cursor < end) {
    let windowStart = cursor;
    if (previous) {
      const candidate = overlapStart(ctx, previous.start, previous.end);
      if (candidate < cursor) windowStart = candidate;
    }

    let window = windowEnd(ctx, windowStart, end);
    if (window.end <= cursor) {
      windowStart = cursor;
      window = windowEnd(ctx, windowStart, end);
    }

    if (window.forced) emitForceTruncate(ctx, windowStart, window.end, "word-over-budget");
    pieces.push(
      slicePiece(ctx, windowStart, window.end, "token-window", window.forced ? "force-truncate" : "token-window"),
    );

    previous = { start: cursor, end: window.end };
    cursor = trimSpan(ctx.body, window.end, end).start;
  }

  return pieces;
}

const SENTENCE_END = /([.!?]+["')\]]*)\s+|\n+/g;

export function sentenceSpans(text: string, start: number, end: number): Span[] {
  const slice = text.slice(start, end);
  const spans: Span[] = [];
  let cursor = 0;

  for (const match of slice.matchAll(SENTENCE_END)) {
    const index = match.index ?? 0;
    const sentenceEnd = index + (match[1]?.length ?? 0);
    const span = trimSpan(text, start + cursor, start + sentenceEnd);
    if (span.end > span.start) spans.push(span);
    cursor = index + match[0].length;
  }
  const tail = trimSpan(text, start + cursor, end);
  if (tail.end > tail.start) spans.push(tail);

  return spans;
}

export function splitSentences(ctx: SplitContext, start: number, end: number): Piece[] {
  return packUnits(ctx, sentenceSpans(ctx.body, start, end), {
    strategy: "sentence",
    typeOf: () => "sentence",
    splitOversized: (unit) => splitTokenWindows(ctx, unit.start, unit.end),
    overlapBefore: () => true,
  });
}

function wrapFence(language: string, code: string): string {
  return `\`\`\`${language}\n${code}\n\`\`\``;
}

function isClosingFence(line: Line): boolean {
  const trimmed = line.text.trim();
  return trimmed.length >= 3 && trimmed.replace(/[`~]/g, "") === "";
}

/**
 * Split a fenced block on line boundaries, re-fencing every group with the
 * original language tag. A single line that cannot fit turns the whole
 * block into a digest.
 */
export function splitCode(ctx: SplitContext, block: Block): Piece[] {
  const lines = linesOf(ctx.body, block.start, block.end);
  const language = block.language ?? "";
  const last = lines[lines.length - 1];
  const closed = lines.length > 1 && last !== undefined && isClosingFence(last);
  const inner = lines.slice(1, closed ? -1 : undefined);
  const hardMax = ctx.config.hardMaxTokens;
  const tokensOf = (code: string) => ctx.tokenizer.count(wrapFence(language, code));

  if (inner.length === 0 || inner.some((line) => tokensOf(line.text) > hardMax)) {
    const originalTokens = countTokens(ctx, block.start, block.end);
    const digest = buildCodeDigest(language, inner, originalTokens);
    ctx.events.emit(
      createEvent(
        "chunk.digest",
        { docId: ctx.docId, language, lines: inner.length, originalTokens },
        ctx.runId,
      ),
    );
    return [
      {
        start: block.start,
        end: block.end,
        text: digest.text,
        tokens: ctx.tokenizer.count(digest.text),
        chunkType: "code",
        strategy: "code-digest",
        verbatim: false,
        atomic: true,
        truncated: false,
        glued: 0,
        digest: digest.meta,
      },
    ];
  }

  const codeOf = (from: Line, to: Line) => ctx.body.slice(from.start, to.end);
  const groups: Line[][] = [];
  let group: Line[] = [];
  for (const line of inner) {
    const first = group[0];
    if (first && tokensOf(codeOf(first, line)) <= hardMax) {
      group.push(line);
    } else {
      if (group.length > 0) groups.push(group);
      group = [line];
    }
  }
  if (group.length > 0) groups.push(group);

  return groups.map((lineGroup, index) => {
    let selected = lineGroup;
    const carried = trailingOverlap(ctx, groups[index - 1]);
    const withOverlap = [...carried, ...lineGroup];
    const head = withOverlap[0];
    const tail = withOverlap[withOverlap.length - 1];
    if (carried.length > 0 && head && tail && tokensOf(codeOf(head, tail)) <= hardMax) {
      selected = withOverlap;
    }

    const from = selected[0];
    const to = selected[selected.length - 1];
    const text = from && to ? wrapFence(language, codeOf(from, to)) : wrapFence(language, "");
    const start = index === 0 ? block.start : (from?.start ?? block.start);
    const end = index === groups.length - 1 ? block.end : (to?.end ?? block.end);

    return {
      start,
      end,
      text,
      tokens: ctx.tokenizer.count(text),
      chunkType: "code",
      strategy: "code-fence-lines",
      verbatim: false,
      atomic: true,
      truncated: false,
      glued: 0,
    } satisfies Piece;
  });
}

/**
 * Trailing lines of the previous group, never all of it, that together fit in
 * `overlapTokens`. Empty for the first group or when overlap is off.
 */
function trailingOverlap(ctx: SplitContext, previous: Line[] | undefined): Line[] {
  const carried: Line[] = [];
  const tail = previous?.[previous.length - 1];
  if (!previous || !tail || ctx.config.overlapTokens <= 0) return carried;
  for (let k = previous.length - 1; k > 0; k--) {
    const line = previous[k];
    if (!line || countTokens(ctx, line.start, tail.end) > ctx.config.overlapTokens) break;
    carried.unshift(line);
  }
  return carried;
}

/**
 * Split a pipe table into row groups; the header and separator rows open
 * every group, followed by the overlap rows of the previous group. Rows are
 * never cut.
 */
export function splitTable(ctx: SplitContext, block: Block): Piece[] {
  const lines = linesOf(ctx.body, block.start, block.end);
  const header = lines.slice(0, 2);
  const rows = lines.slice(2);
  const headerFirst = header[0];
  const headerLast = header[header.length - 1];
  if (rows.length === 0 || !headerFirst || !headerLast) {
    return splitTokenWindows(ctx, block.start, block.end);
  }

  const headerText = ctx.body.slice(headerFirst.start, headerLast.end);
  const textOf = (from: Line, to: Line) => `${headerText}\n${ctx.body.slice(from.start, to.end)}`;
  const hardMax = ctx.config.hardMaxTokens;

  const groups: Line[][] = [];
  let group: Line[] = [];
  for (const row of rows) {
    const first = group[0];
    if (first && ctx.tokenizer.count(textOf(first, row)) <= hardMax) {
      group.push(row);
    } else {
      if (group.length > 0) groups.push(group);
      group = [row];
    }
  }
  if (group.length > 0) groups.push(group);

  const pieces: Piece[] = [];
  groups.forEach((rowGroup, index) => {
    const carried = trailingOverlap(ctx, groups[index - 1]);
    const withOverlap = [...carried, ...rowGroup];
    const lastRow = rowGroup[rowGroup.length - 1];
    const selected =
      carried[0] && lastRow && ctx.tokenizer.count(textOf(carried[0], lastRow)) <= hardMax
        ? withOverlap
        : rowGroup;
    const first = selected[0];
    const last = selected[selected.length - 1];
    if (!first || !last) return;
    const text = textOf(first, last);
    const start = index === 0 ? block.start : first.start;
    pieces.push({
      start,
      end: last.end,
      text,
      tokens: ctx.tokenizer.count(text),
      chunkType: "table",
      strategy: "table-rows",
      verbatim: text === ctx.body.slice(start, last.end),
      atomic: true,
      truncated: false,
      glued: 0,
    });
  });
  return pieces;
}

export function blockType(group: Block[]): ChunkType {
  const first = group[0];
  if (!first) return "paragraph";
  if (group.length === 1 && (first.kind === "code" || first.kind === "table")) return first.kind;
  return first.kind === "heading" ? "heading" : "paragraph";
}

/** Paragraph-level packing of one section; oversized blocks go to their own splitter. */
export function splitBlocks(ctx: SplitContext, start: number, end: number): Piece[] {
  return packUnits(ctx, parseBlocks(ctx.body, start, end), {
    strategy: "paragraph",
    typeOf: blockType,
    atomicOf: (group) => group.length === 1 && (group[0]?.kind === "code" || group[0]?.kind === "table"),
    overlapBefore: (first) => first.kind === "paragraph",
    splitOversized: (block) => {
      switch (block.kind) {
        case "code":
          return splitCode(ctx, block);
        case "table":
          return splitTable(ctx, block);
        case "heading":
        case "paragraph":
          return splitSentences(ctx, block.start, block.end);
      }
    },
  });
}
