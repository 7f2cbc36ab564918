import type { SectionMapEntry } from "@corpora/types";
import { linesOf, lineStartAt, trimSpan, type Line, type Span } from "./spans.js";

export type BlockKind = "heading" | "paragraph" | "code" | "table";

export interface Block extends Span {
  kind: BlockKind;
  language?: string;
}

const HEADING_LINE = /^#{1,6}\s+\S/;
const FENCE_OPEN = /^\s{0,3}(`{3,}|~{3,})\s*([\w+#.-]*)/;
const TABLE_SEPARATOR = /^\s*\|?\s*:?-{3,}:?\s*(\|\s*:?-{3,}:?\s*)*\|?\s*$/;

export function isHeadingLine(line: string): boolean {
  return HEADING_LINE.test(line);
}

function isBlank(line: Line): boolean {
  return line.text.trim().length === 0;
}

function fenceOf(line: Line): { marker: string; language: string } | undefined {
  const match = FENCE_OPEN.exec(line.text);
  if (!match) return undefined;
  return { marker: match[1] ?? "```", language: match[2] ?? "" };
}

function closesFence(line: Line, marker: string): boolean {
  const trimmed = line.text.trim();
  return trimmed.startsWith(marker.charAt(0).repeat(marker.length)) && trimmed.replace(/[`~]/g, "") === "";
}

function isTableStart(lines: Line[], index: number): boolean {
  const first = lines[index];
  const second = lines[index + 1];
  if (!first || !second) return false;
  return first.text.includes("|") && TABLE_SEPARATOR.test(second.text);
}

/** Index of the closing fence line, or the last line when the fence is never closed. */
function findFenceEnd(lines: Line[], openIndex: number, marker: string): number {
  for (let j = openIndex + 1; j < lines.length; j++) {
    const line = lines[j];
    if (line && closesFence(line, marker)) return j;
  }
  return lines.length - 1;
}

/**
 * Classify [start, end) into blocks: fenced code, pipe tables, heading
 * lines and blank-line separated paragraphs. Code and tables are kept whole.
 */
export function parseBlocks(text: string, start: number, end: number): Block[] {
  const lines = linesOf(text, start, end);
  const blocks: Block[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i];
    if (!line || isBlank(line)) {
      i++;
      continue;
    }

    const fence = fenceOf(line);
    if (fence) {
      const close = findFenceEnd(lines, i, fence.marker);
      const last = lines[close] ?? line;
      blocks.push({ kind: "code", start: line.start, end: last.end, language: fence.language });
      i = close + 1;
      continue;
    }

    if (isTableStart(lines, i)) {
      let j = i;
      while (j + 1 < lines.length) {
        const next = lines[j + 1];
        if (!next || isBlank(next) || !next.text.includes("|")) break;
        j++;
      }
      blocks.push({ kind: "table", start: line.start, end: lines[j]?.end ?? line.end });
      i = j + 1;
      continue;
    }

    if (isHeadingLine(line.text)) {
      blocks.push({ kind: "heading", start: line.start, end: line.end });
      i++;
      continue;
    }

    let j = i;
    while (j + 1 < lines.length) {
      const next = lines[j + 1];
      if (!next || isBlank(next) || fenceOf(next) || isHeadingLine(next.text) || isTableStart(lines, j + 1)) {
        break;
      }
      j++;
    }
    blocks.push({ kind: "paragraph", start: line.start, end: lines[j]?.end ?? line.end });
    i = j + 1;
  }

  return blocks
    .map((block) => ({ ...block, ...trimSpan(text, block.start, block.end) }))
    .filter((block) => block.end > block.start);
}

/**
 * Section start offsets: the normalizer's section map when it has usable
 * entries, otherwise markdown heading lines outside code fences.
 * Always starts with 0.
 */
export function sectionBoundaries(text: string, sectionMap?: SectionMapEntry[]): number[] {
  const offsets = new Set<number>([0]);

  const mapped = (sectionMap ?? []).filter(
    (entry) => Number.isInteger(entry.offset) && entry.offset >= 0 && entry.offset < text.length,
  );

  if (mapped.length > 0) {
    for (const entry of mapped) offsets.add(lineStartAt(text, entry.offset));
  } else {
    let fenceMarker: string | undefined;
    for (const line of linesOf(text, 0, text.length)) {
      if (fenceMarker) {
        if (closesFence(line, fenceMarker)) fenceMarker = undefined;
        continue;
      }
      const fence = fenceOf(line);
      if (fence) {
        fenceMarker = fence.marker;
        continue;
      }
      if (isHeadingLine(line.text)) offsets.add(line.start);
    }
  }

  return [...offsets].sort((a, b) => a - b);
}

export function sectionsOf(text: string, boundaries: number[]): Span[] {
  return boundaries.map((start, index) => ({
    start,
    end: boundaries[index + 1] ?? text.length,
  }));
}
