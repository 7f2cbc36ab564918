import type { Chunk, DocumentRecord } from "@corpora/types";
import type { RunArtifacts } from "@corpora/artifacts";

/**
 * What ingestion needs from a chunked run: the chunk records in order and
 * the per-document attributes stored beside them. Ingestion never re-chunks.
 */
export interface MaterializedChunkSource {
  readonly runId: string;
  chunks(): AsyncIterable<Chunk>;
  documents(): Promise<Map<string, DocumentRecord>>;
}

/** Reads `chunk/chunks.ndjson` and `enrich/enriched.jsonl` of one run. */
export function runChunkSource(artifacts: RunArtifacts): MaterializedChunkSource {
  return {
    runId: artifacts.runId,
    chunks: () => artifacts.streamChunks(),
    async documents() {
      const records = new Map<string, DocumentRecord>();
      if (!(await artifacts.hasEnriched())) return records;
      for await (const doc of artifacts.streamEnriched()) {
        records.set(doc.docId, {
          docId: doc.docId,
          title: doc.title,
          url: doc.url,
          sourceSystem: doc.sourceSystem,
          ...(doc.spaceKey ? { spaceKey: doc.spaceKey } : {}),
          ...(doc.doctype ? { doctype: doc.doctype } : {}),
        });
      }
      return records;
    },
  };
}

/** In-memory source, for tests and callers that already hold the chunks. */
export function arrayChunkSource(
  runId: string,
  items: Chunk[],
  docs: DocumentRecord[] = [],
): MaterializedChunkSource {
  return {
    runId,
    async *chunks() {
      yield* items;
    },
    async documents() {
      return new Map(docs.map((doc) => [doc.docId, doc]));
    },
  };
}

/** Document row for a chunk, falling back to the chunk's own traceability. */
export function documentFor(chunk: Chunk, known: Map<string, DocumentRecord>): DocumentRecord {
  return (
    known.get(chunk.docId) ?? {
      docId: chunk.docId,
      title: chunk.traceability.title,
      url: chunk.traceability.url,
      sourceSystem: chunk.traceability.sourceSystem,
    }
  );
}
