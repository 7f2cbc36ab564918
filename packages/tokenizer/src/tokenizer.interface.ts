export interface ITokenizer {
  readonly name: string;
  count(text: string): number;
  /**
   * Longest prefix of `text` (in characters) whose token count is at most
   * `maxTokens`. Never splits a surrogate pair.
   */
  fitPrefix(text: string, maxTokens: number): number;
}
