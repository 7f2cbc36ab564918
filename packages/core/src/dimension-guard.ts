import { DimensionMismatchError } from "@corpora/errors";
import type { IEmbeddingProvider } from "@corpora/embeddings";

/**
 * The provider's output width: its declared `dimensions`, or the length of
 * one probe embedding when it declares none.
 */
export async function resolveProviderDimension(
  provider: IEmbeddingProvider,
  probe: (fn: () => Promise<number>) => Promise<number> = (fn) => fn(),
): Promise<number> {
  if (provider.dimensions !== undefined) return provider.dimensions;
  return probe(async () => {
    const result = await provider.embed("dimension probe");
    return result.embeddings[0]?.length ?? 0;
  });
}

export function assertDimension(
  expected: number,
  actual: number,
  provider: IEmbeddingProvider,
  runId?: string,
): void {
  if (actual !== expected) {
    throw new DimensionMismatchError(
      { expected, actual, provider: provider.name, model: provider.model },
      { runId },
    );
  }
}
