import type { Span } from "./spans.js";
import { isWhitespace, trimSpan } from "./spans.js";

export interface CoverageResult {
  coveragePct: number;
  gaps: Array<[number, number]>;
}

export function mergeSpans(spans: Span[]): Span[] {
  const sorted = spans.filter((s) => s.end > s.start).sort((a, b) => a.start - b.start);
  const merged: Span[] = [];
  for (const span of sorted) {
    const last = merged[merged.length - 1];
    if (last && span.start <= last.end) {
      last.end = Math.max(last.end, span.end);
    } else {
      merged.push({ ...span });
    }
  }
  return merged;
}

function countVisible(text: string, start: number, end: number): number {
  let count = 0;
  for (let i = start; i < end; i++) {
    if (!isWhitespace(text[i])) count++;
  }
  return count;
}

/**
 * Share of non-whitespace characters of `text` inside the given spans, in
 * percent, and the uncovered ranges that hold visible text.
 */
export function calculateCoverage(text: string, spans: Span[]): CoverageResult {
  const total = countVisible(text, 0, text.length);
  if (total === 0) return { coveragePct: 100, gaps: [] };

  const merged = mergeSpans(spans);
  let covered = 0;
  const gaps: Array<[number, number]> = [];
  let cursor = 0;

  for (const span of merged) {
    const start = Math.max(0, Math.min(span.start, text.length));
    const end = Math.max(start, Math.min(span.end, text.length));
    if (start > cursor) {
      const gap = trimSpan(text, cursor, start);
      if (gap.end > gap.start) gaps.push([gap.start, gap.end]);
    }
    covered += countVisible(text, Math.max(start, cursor), end);
    cursor = Math.max(cursor, end);
  }
  if (cursor < text.length) {
    const gap = trimSpan(text, cursor, text.length);
    if (gap.end > gap.start) gaps.push([gap.start, gap.end]);
  }

  return { coveragePct: Math.round((covered / total) * 10_000) / 100, gaps };
}
