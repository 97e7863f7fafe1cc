// ============================================
// Supabase client: pgvector knowledge base
// ============================================

import { createClient, type SupabaseClient } from "@supabase/supabase-js";

export type RpcResult = {
  data: unknown;
  error: { message: string; code?: string } | null;
};

/** The slice of the Supabase client used for vector search */
export interface VectorStoreRpc {
  rpc(fn: string, args: Record<string, unknown>, options?: { signal?: AbortSignal }): PromiseLike<RpcResult>;
}

export function createSupabaseClient(options: { url: string; serviceRoleKey: string }): SupabaseClient {
  return createClient(options.url, options.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}

export function vectorStoreFrom(client: SupabaseClient): VectorStoreRpc {
  return {
    rpc: (fn, args, options) => {
      const query = client.rpc(fn, args);
      return options?.signal ? query.abortSignal(options.signal) : query;
    },
  };
}
