import type { PackedContext, RetrievalHit } from "@corpora/types";

export const TRUNCATION_NOTE = "\n[... truncated]";
/** A partial segment shorter than this is left out. */
const MIN_PARTIAL_CHARS = 20;
/** Room a partial segment needs beyond its header. */
const MIN_PARTIAL_ROOM = 50;

const FENCE_PATTERN = /```/g;

function segmentHeader(hit: RetrievalHit, position: number): string {
  let header = `\n\n--- Chunk ${String(position)} (score: ${hit.fusedScore.toFixed(3)}) ---\n`;
  if (hit.title) header += `Title: ${hit.title}\n`;
  if (hit.url) header += `URL: ${hit.url}\n`;
  return `${header}\n`;
}

/** [start, end) spans of fenced code; an unclosed fence runs to the end. */
function fencedRegions(text: string): Array<[number, number]> {
  const marks = [...text.matchAll(FENCE_PATTERN)].map((match) => match.index);
  const regions: Array<[number, number]> = [];
  for (let i = 0; i < marks.length; i += 2) {
    const start = marks[i];
    if (start === undefined) break;
    const close = marks[i + 1];
    regions.push([start, close === undefined ? text.length : close + 3]);
  }
  return regions;
}

/** Largest cut ≤ `limit` that does not fall strictly inside a code fence. */
export function safeCut(text: string, limit: number): number {
  let cut = Math.min(limit, text.length);
  for (const [start, end] of fencedRegions(text)) {
    if (cut > start && cut < end) {
      cut = start;
      break;
    }
  }
  return cut;
}

/**
 * Pack ranked hits into at most `budget` characters. Each hit gets a header
 * with its position, fused score, title and URL. The first hit that does
 * not fit is cut at a point outside any code fence and marked truncated;
 * packing stops there.
 */
export function packContext(hits: RetrievalHit[], budget: number): PackedContext {
  let text = "";
  const chunkIds: string[] = [];
  let truncated = false;

  for (const [index, hit] of hits.entries()) {
    const header = segmentHeader(hit, index + 1);
    const segment = header + hit.text;

    if (text.length + segment.length <= budget) {
      text += segment;
      chunkIds.push(hit.chunkId);
      continue;
    }

    const remaining = budget - text.length;
    if (remaining > header.length + MIN_PARTIAL_ROOM) {
      const room = remaining - header.length - TRUNCATION_NOTE.length;
      const partial = hit.text.slice(0, safeCut(hit.text, room));
      if (partial.trim().length > MIN_PARTIAL_CHARS) {
        text += header + partial + TRUNCATION_NOTE;
        chunkIds.push(hit.chunkId);
        truncated = true;
      }
    }
    break;
  }

  return { budget, text, chunkIds, truncated };
}
