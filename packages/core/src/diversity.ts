export interface TraceableHit {
  docId: string;
  title: string;
  url: string;
}

export function isTraceable(hit: TraceableHit): boolean {
  return hit.title.trim().length > 0 && hit.url.trim().length > 0;
}

/** Walk hits in order and drop any beyond `maxPerDoc` for the same doc_id. */
export function capPerDocument<T extends TraceableHit>(hits: T[], maxPerDoc: number): T[] {
  const counts = new Map<string, number>();
  const kept: T[] = [];
  for (const hit of hits) {
    const seen = counts.get(hit.docId) ?? 0;
    if (seen >= maxPerDoc) continue;
    counts.set(hit.docId, seen + 1);
    kept.push(hit);
  }
  return kept;
}
