import type { ITokenizer } from "./tokenizer.interface.js";

/** Rough estimate: ~4 characters per token for English text. */
export const CHARS_PER_TOKEN = 4;

export class HeuristicTokenizer implements ITokenizer {
  readonly name = "heuristic";

  count(text: string): number {
    return Math.ceil(text.length / CHARS_PER_TOKEN);
  }

  fitPrefix(text: string, maxTokens: number): number {
    // Binary search on the prefix length; count() is monotonic in length.
    let lo = 0;
    let hi = text.length;
    while (lo < hi) {
      const mid = Math.ceil((lo + hi) / 2);
      if (this.count(text.slice(0, mid)) <= maxTokens) lo = mid;
      else hi = mid - 1;
    }
    if (lo > 0 && lo < text.length && isHighSurrogate(text.charCodeAt(lo - 1))) lo -= 1;
    return lo;
  }
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
