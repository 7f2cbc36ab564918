import type {
  EventSink,
  RetrievalConfig,
  RetrievalHit,
  RetrievalProfile,
  RetrievalRequest,
  RetrievalResponse,
} from "@corpora/types";
import type { IEmbeddingProvider } from "@corpora/embeddings";
import type { CandidateRow, IVectorStore } from "@corpora/vector-store";
import { DimensionMismatchError, ValidationError } from "@corpora/errors";
import { createEvent, createSilentLogger, NoopEventSink, type Logger } from "@corpora/logger";
import { analyzeQuery } from "./query-analysis.js";
import { compareChunkIds, DEFAULT_RRF_K, reciprocalRankFusion } from "./fusion.js";
import { computeBoost } from "./boosts.js";
import { capPerDocument, isTraceable } from "./diversity.js";
import { packContext } from "./context-assembler.js";

export const RETRIEVAL_DEFAULTS: Omit<RetrievalConfig, "profilePath"> = {
  topK: 8,
  rrfK: DEFAULT_RRF_K,
  topkDense: 200,
  topkBm25: 200,
  maxChunksPerDoc: 3,
};

const SNIPPET_LENGTH = 200;

export interface RetrievalDependencies {
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  profile: RetrievalProfile;
  defaults?: Partial<Omit<RetrievalConfig, "profilePath">>;
  events?: EventSink;
  logger?: Logger;
  now?: () => number;
}

export function snippetOf(text: string): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  if (collapsed.length <= SNIPPET_LENGTH) return collapsed;
  return `${collapsed.slice(0, SNIPPET_LENGTH).trimEnd()}...`;
}

function positiveInt(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer`, { [name]: String(value) });
  }
  return value;
}

async function timed<T>(now: () => number, fn: () => Promise<T>): Promise<{ value: T; ms: number }> {
  const start = now();
  const value = await fn();
  return { value, ms: now() - start };
}

/**
 * Retrieval pipeline: Analyze -> (Dense ‖ Lexical) -> RRF -> Boost -> Sort
 * -> Traceability -> Per-doc cap -> Top K -> Pack
 *
 * Both legs see the expanded query. Untraceable hits are removed before the
 * per-document quota is counted, so they never use up a document's slots.
 */
export async function retrieve(
  request: RetrievalRequest,
  deps: RetrievalDependencies,
): Promise<RetrievalResponse> {
  const now = deps.now ?? Date.now;
  const startTime = now();
  const events = deps.events ?? new NoopEventSink();
  const logger = (deps.logger ?? createSilentLogger()).child({ stage: "retrieve" });
  const settings = { ...RETRIEVAL_DEFAULTS, ...deps.defaults };
  const provider = deps.embeddingProvider;

  if (!request.queryText.trim()) {
    throw new ValidationError("queryText must not be empty", { queryText: "empty" });
  }
  if (request.provider !== undefined && request.provider !== provider.name) {
    throw new ValidationError(
      `Requested provider ${request.provider} but ${provider.name} is configured`,
      { provider: request.provider },
    );
  }
  const topK = positiveInt("topK", request.topK ?? settings.topK);
  const rrfK = positiveInt("rrfK", request.rrfK ?? settings.rrfK);
  const topkDense = positiveInt("topkDense", request.topkDense ?? settings.topkDense);
  const topkBm25 = positiveInt("topkBm25", request.topkBm25 ?? settings.topkBm25);
  const maxChunksPerDoc = positiveInt(
    "maxChunksPerDoc",
    request.maxChunksPerDoc ?? settings.maxChunksPerDoc,
  );
  const budgets = (request.budgets ?? []).map((budget) => positiveInt("budgets", budget));
  const hybridEnabled = request.hybridEnabled ?? true;
  const boostsEnabled = request.boostsEnabled ?? true;

  const query = analyzeQuery(request.queryText, deps.profile);
  const spaceWhitelist =
    request.spaceWhitelist ??
    (request.domainFilterEnabled && query.isDomainQuery ? deps.profile.domain.spaceWhitelist : []);

  events.emit(
    createEvent("retrieve.start", {
      query: query.original,
      expanded: query.expanded,
      isDomainQuery: query.isDomainQuery,
      hybridEnabled,
      topK,
    }),
  );

  const denseLeg = timed(now, async () => {
    const embedded = await provider.embed(query.expanded);
    const vector = embedded.embeddings[0] ?? [];
    const expected = request.dimension ?? provider.dimensions;
    if (expected !== undefined && vector.length !== expected) {
      throw new DimensionMismatchError({
        expected,
        actual: vector.length,
        provider: provider.name,
        model: provider.model,
      });
    }
    return deps.vectorStore.denseSearch({
      vector,
      provider: provider.name,
      topK: topkDense,
      spaceWhitelist,
    });
  });
  const lexicalLeg: Promise<{ value: CandidateRow[]; ms: number }> = hybridEnabled
    ? timed(now, () =>
        deps.vectorStore.lexicalSearch({ query: query.expanded, topK: topkBm25, spaceWhitelist }),
      )
    : Promise.resolve({ value: [], ms: 0 });

  const [dense, lexical] = await Promise.all([denseLeg, lexicalLeg]);

  const fused = reciprocalRankFusion(dense.value, lexical.value, rrfK);

  const ranked: RetrievalHit[] = fused
    .map((candidate) => {
      const boost = boostsEnabled ? computeBoost(candidate.row, deps.profile) : undefined;
      return {
        chunkId: candidate.row.chunkId,
        docId: candidate.row.docId,
        title: candidate.row.title,
        url: candidate.row.url,
        snippet: snippetOf(candidate.row.text),
        text: candidate.row.text,
        denseRank: candidate.denseRank,
        bm25Rank: candidate.bm25Rank,
        ...(boost !== undefined ? { boost } : {}),
        fusedScore: candidate.rrfScore + (boost ?? 0),
      };
    })
    .sort((a, b) => b.fusedScore - a.fusedScore || compareChunkIds(a.chunkId, b.chunkId));

  const traceable = ranked.filter(isTraceable);
  const hits = capPerDocument(traceable, maxChunksPerDoc).slice(0, topK);
  const contexts = budgets.map((budget) => packContext(hits, budget));

  const timings = { denseMs: dense.ms, lexicalMs: lexical.ms, totalMs: now() - startTime };
  const candidates = {
    dense: dense.value.length,
    lexical: lexical.value.length,
    fused: fused.length,
    droppedUntraceable: ranked.length - traceable.length,
  };

  events.emit(createEvent("retrieve.complete", { hits: hits.length, ...candidates, ...timings }));
  logger.debug({ hits: hits.length, ...candidates, ...timings }, "Retrieval complete");

  return { hits, contexts, query, spaceWhitelist, candidates, timings };
}
