import { TokenizerUnavailableError } from "@corpora/errors";
import type { ITokenizer } from "./tokenizer.interface.js";
import { HeuristicTokenizer } from "./heuristic-tokenizer.js";

export type TokenizerName = "heuristic";

export function isTokenizerName(name: string): name is TokenizerName {
  return name === "heuristic";
}

/**
 * Create a tokenizer by name. Throws TokenizerUnavailableError for names
 * this build does not ship.
 */
export function createTokenizer(name: string): ITokenizer {
  if (!isTokenizerName(name)) {
    throw new TokenizerUnavailableError(name);
  }
  switch (name) {
    case "heuristic":
      return new HeuristicTokenizer();
  }
}
