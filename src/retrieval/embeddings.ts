// ============================================
// Embeddings: OpenAI embedding generation
// Pin the model for retrieval determinism
// ============================================

import type OpenAI from "openai";
import { logger } from "../lib/logger.js";

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";
export const EMBEDDING_DIMENSIONS = 1536;

/** Longest input sent to the embedding model */
const MAX_INPUT_CHARS = 8000;

export type EmbeddingRequest = {
  model: string;
  input: string;
  dimensions?: number;
};

/** The slice of the OpenAI SDK used for embeddings */
export interface EmbeddingsApi {
  embeddings: {
    create(
      body: EmbeddingRequest,
      options?: { signal?: AbortSignal }
    ): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

export function embeddingsApiFrom(openai: OpenAI): EmbeddingsApi {
  return {
    embeddings: {
      create: (body, options) => openai.embeddings.create(body, options),
    },
  };
}

export type QueryEmbedder = (text: string, options?: { signal?: AbortSignal; requestId?: string }) => Promise<number[]>;

/**
 * Build an embedder for query strings.
 */
export function createQueryEmbedder(api: EmbeddingsApi, model: string = DEFAULT_EMBEDDING_MODEL): QueryEmbedder {
  return async (text, options = {}) => {
    try {
      const response = await api.embeddings.create(
        {
          model,
          input: text.slice(0, MAX_INPUT_CHARS),
          dimensions: EMBEDDING_DIMENSIONS,
        },
        { signal: options.signal }
      );
      const embedding = response.data[0]?.embedding;
      if (!embedding) {
        throw new Error("No embedding returned from OpenAI");
      }
      return embedding;
    } catch (err) {
      logger.error("Embedding generation failed", {
        stage: "retrieval",
        requestId: options.requestId,
        textPreview: text.slice(0, 50),
        error: err,
      });
      throw err;
    }
  };
}
