import { join } from "node:path";

export interface RunPaths {
  root: string;
  enriched: string;
  chunks: string;
  assurance: string;
  preflight: string;
  skiplist: string;
  embedSummary: string;
  events: string;
}

/** Files a run reads and writes under `<runsDir>/<runId>/`. */
export function runPaths(runsDir: string, runId: string): RunPaths {
  const root = join(runsDir, runId);
  return {
    root,
    enriched: join(root, "enrich", "enriched.jsonl"),
    chunks: join(root, "chunk", "chunks.ndjson"),
    assurance: join(root, "chunk", "assurance.json"),
    preflight: join(root, "preflight", "preflight.json"),
    skiplist: join(root, "preflight", "doc_skiplist.json"),
    embedSummary: join(root, "embed", "summary.json"),
    events: join(root, "events.jsonl"),
  };
}
