import type { CodeDigestMeta } from "@corpora/types";
import type { Line } from "./spans.js";

const SYMBOL_PATTERN =
  /\b(?:function|def|class|interface|type|enum|struct|trait|fn|func|const|let|var)\s+([A-Za-z_$][\w$]*)/g;

const HEAD_LINES = 3;
const MAX_HEAD_LINE_CHARS = 160;
const MAX_SYMBOLS = 8;

/** Most frequent declared names, in order of first appearance on ties. */
export function extractSymbols(code: string, limit = MAX_SYMBOLS): string[] {
  const counts = new Map<string, number>();
  for (const match of code.matchAll(SYMBOL_PATTERN)) {
    const name = match[1];
    if (name) counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([name]) => name);
}

export interface CodeDigest {
  text: string;
  meta: CodeDigestMeta;
}

/**
 * Compact stand-in for a code block too large to chunk line by line:
 * language, key symbols and the first few lines, re-fenced.
 */
export function buildCodeDigest(language: string, lines: Line[], originalTokens: number): CodeDigest {
  const code = lines.map((line) => line.text).join("\n");
  const symbols = extractSymbols(code);
  const head = lines
    .slice(0, HEAD_LINES)
    .map((line) =>
      line.text.length > MAX_HEAD_LINE_CHARS ? `${line.text.slice(0, MAX_HEAD_LINE_CHARS)} ...` : line.text,
    );

  const parts = [
    `\`\`\`${language}`,
    `# Code digest: ${language || "text"}, ${String(lines.length)} lines, ${String(originalTokens)} tokens`,
    `# Key symbols: ${symbols.length > 0 ? symbols.join(", ") : "none"}`,
    ...head,
  ];
  if (lines.length > HEAD_LINES) {
    parts.push(`# ... (${String(lines.length - HEAD_LINES)} more lines)`);
  }
  parts.push("```");

  return { text: parts.join("\n"), meta: { language, symbols, originalTokens } };
}
