import type { ChunkSkipReason } from "@corpora/types";
import { ChunkingError } from "@corpora/errors";

/** A document the chunker refuses as a whole; the batch records it and moves on. */
export class DocumentSkipError extends ChunkingError {
  readonly reason: ChunkSkipReason;

  constructor(reason: ChunkSkipReason, docId: string, message: string) {
    super(message, docId, { details: { reason } });
    this.reason = reason;
  }
}
