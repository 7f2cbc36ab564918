/** Heading anchor produced by the normalizer: `offset` is a char index into `bodyText`. */
export interface SectionMapEntry {
  heading: string;
  offset: number;
  level?: number;
}

export interface SourceDocument {
  docId: string;
  title: string;
  url: string;
  sourceSystem: string;
  bodyText: string;
  sectionMap?: SectionMapEntry[];
}

/** A normalized document plus the enrichment attributes preflight and retrieval read. */
export interface EnrichedDocument extends SourceDocument {
  qualityScore: number;
  doctype?: string;
  spaceKey?: string;
  labels: string[];
}

/** Per-document metadata the store keeps beside chunks. */
export interface DocumentRecord {
  docId: string;
  title: string;
  url: string;
  sourceSystem: string;
  spaceKey?: string;
  doctype?: string;
}
