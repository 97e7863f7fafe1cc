// ============================================
// Passage Retriever Port
// ============================================

export type RetrieveOptions = {
  signal?: AbortSignal;
  requestId?: string;
};

export interface PassageRetriever {
  /**
   * Up to `k` passage texts, most relevant first.
   * Resolves with an empty array when nothing matches; rejects on transport failure.
   */
  retrieve(query: string, k: number, options?: RetrieveOptions): Promise<string[]>;
}
