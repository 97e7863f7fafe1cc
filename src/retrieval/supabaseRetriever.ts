// ============================================
// Supabase Retriever: embed the query, call the match RPC
// ============================================

import { z } from "zod";
import { createRequestLogger } from "../lib/logger.js";
import { retrievalError, isSupportBotError, describeCause } from "../lib/errors.js";
import { withTimeout } from "../lib/timeout.js";
import type { VectorStoreRpc } from "../db/supabase.js";
import type { QueryEmbedder } from "./embeddings.js";
import type { PassageRetriever, RetrieveOptions } from "./retriever.js";

export const DEFAULT_MATCH_RPC = "match_passages";
export const DEFAULT_RETRIEVAL_TIMEOUT_MS = 5000;

/** Rows returned by the match RPC, ordered by similarity descending */
const matchRowsSchema = z.array(
  z.object({
    id: z.union([z.string(), z.number()]).optional(),
    content: z.string(),
    similarity: z.number().optional(),
  })
);

export type SupabaseRetrieverOptions = {
  store: VectorStoreRpc;
  embed: QueryEmbedder;
  rpcName?: string;
  timeoutMs?: number;
};

export class SupabaseRetriever implements PassageRetriever {
  private readonly store: VectorStoreRpc;
  private readonly embed: QueryEmbedder;
  private readonly rpcName: string;
  private readonly timeoutMs: number;

  constructor(options: SupabaseRetrieverOptions) {
    this.store = options.store;
    this.embed = options.embed;
    this.rpcName = options.rpcName ?? DEFAULT_MATCH_RPC;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RETRIEVAL_TIMEOUT_MS;
  }

  async retrieve(query: string, k: number, options: RetrieveOptions = {}): Promise<string[]> {
    const { requestId, signal } = options;
    const log = createRequestLogger(requestId ?? "-", "retrieval");
    const startTime = Date.now();

    try {
      const rows = await withTimeout(
        `${this.rpcName} search`,
        (searchSignal) => this.search(query, k, { requestId, signal: searchSignal }),
        this.timeoutMs,
        signal
      );

      log.info("Passage search complete", {
        rpc: this.rpcName,
        requested: k,
        returned: rows.length,
        durationMs: Date.now() - startTime,
      });

      return rows.slice(0, k).map((row) => row.content);
    } catch (err) {
      log.error("Passage search failed", {
        rpc: this.rpcName,
        durationMs: Date.now() - startTime,
        error: err,
      });
      if (isSupportBotError(err)) {
        throw err;
      }
      throw retrievalError(`Passage search failed: ${describeCause(err)}`, requestId, err);
    }
  }

  private async search(query: string, k: number, options: RetrieveOptions) {
    const queryEmbedding = await this.embed(query, options);

    const { data, error } = await this.store.rpc(
      this.rpcName,
      { query_embedding: queryEmbedding, match_count: k },
      { signal: options.signal }
    );

    if (error) {
      throw retrievalError(`${this.rpcName} RPC failed: ${error.message}`, options.requestId, error);
    }

    const parsed = matchRowsSchema.safeParse(data ?? []);
    if (!parsed.success) {
      throw retrievalError(`${this.rpcName} returned unexpected rows`, options.requestId, parsed.error);
    }

    return parsed.data;
  }
}
