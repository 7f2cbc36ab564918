export interface Span {
  start: number;
  end: number;
}

export interface Line extends Span {
  text: string;
}

const WHITESPACE = /\s/;

export function isWhitespace(char: string | undefined): boolean {
  return char !== undefined && WHITESPACE.test(char);
}

/** Shrink [start, end) so it neither begins nor ends with whitespace. Empty spans collapse to start. */
export function trimSpan(text: string, start: number, end: number): Span {
  let s = start;
  let e = end;
  while (s < e && isWhitespace(text[s])) s++;
  while (e > s && isWhitespace(text[e - 1])) e--;
  return { start: s, end: e };
}

/** Lines inside [start, end); `end` of a line excludes its newline. */
export function linesOf(text: string, start: number, end: number): Line[] {
  const lines: Line[] = [];
  let cursor = start;
  while (cursor < end) {
    const newline = text.indexOf("\n", cursor);
    const lineEnd = newline === -1 || newline >= end ? end : newline;
    lines.push({ start: cursor, end: lineEnd, text: text.slice(cursor, lineEnd) });
    cursor = lineEnd + 1;
  }
  return lines;
}

export function lineStartAt(text: string, offset: number): number {
  if (offset <= 0) return 0;
  return text.lastIndexOf("\n", offset - 1) + 1;
}
