export type { ITokenizer } from "./tokenizer.interface.js";
export { HeuristicTokenizer, CHARS_PER_TOKEN } from "./heuristic-tokenizer.js";
export { createTokenizer, isTokenizerName } from "./factory.js";
export type { TokenizerName } from "./factory.js";
