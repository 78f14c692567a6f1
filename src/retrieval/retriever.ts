/**
 * Retrieval adapter contract.
 */

import type { Document, Outcome } from "../types/index.js";

export class RetrievalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RetrievalError";
  }
}

export interface Retriever {
  /**
   * Return up to `topK` documents for `query`, in the service's relevance
   * order. Never throws for service failures.
   */
  retrieve(query: string, topK: number): Promise<Outcome<Document[], RetrievalError>>;
}
