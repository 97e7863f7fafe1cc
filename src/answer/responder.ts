// ============================================
// Responder: retrieve, augment, generate
// Reports failure to the caller instead of returning an empty answer
// ============================================

import { createRequestLogger } from "../lib/logger.js";
import {
  describeCause,
  emptyResponseError,
  generationError,
  isSupportBotError,
  retrievalError,
  type SupportBotError,
} from "../lib/errors.js";
import type { TextCompletionPort } from "../llm/completion.js";
import { buildAnswerPrompt } from "../llm/prompts.js";
import type { PassageRetriever } from "../retrieval/retriever.js";
import { DEFAULT_TOP_K, type AnswerableCategory } from "../router/types.js";

export type ResponderOutcome =
  | { ok: true; response: string; retrievedPassages: string[] }
  | { ok: false; error: SupportBotError; retrievedPassages: string[] };

export type RespondOptions = {
  signal?: AbortSignal;
  requestId?: string;
};

export type ResponderDeps = {
  completion: TextCompletionPort;
  retriever: PassageRetriever;
  brandName: string;
  topK?: number;
};

export class Responder {
  private readonly completion: TextCompletionPort;
  private readonly retriever: PassageRetriever;
  private readonly brandName: string;
  readonly topK: number;

  constructor(deps: ResponderDeps) {
    this.completion = deps.completion;
    this.retriever = deps.retriever;
    this.brandName = deps.brandName;
    this.topK = deps.topK ?? DEFAULT_TOP_K;
  }

  /**
   * Answer a query from the knowledge base.
   *
   * Zero passages is not a failure: the prompt carries a no-context marker instead.
   * Retrieval errors, generation errors and blank generations are.
   */
  async respond(
    query: string,
    category: AnswerableCategory,
    options: RespondOptions = {}
  ): Promise<ResponderOutcome> {
    const { requestId, signal } = options;
    const log = createRequestLogger(requestId ?? "-", "responder");
    const trimmed = query.trim();

    // Step 1: Retrieve
    let passages: string[];
    try {
      const retrieved = await this.retriever.retrieve(trimmed, this.topK, { signal, requestId });
      passages = retrieved.slice(0, this.topK);
    } catch (err) {
      log.warn("Retrieval failed", { error: err });
      return {
        ok: false,
        error: isSupportBotError(err, "RUN_CANCELLED")
          ? err
          : retrievalError(`Retrieval failed: ${describeCause(err)}`, requestId, err),
        retrievedPassages: [],
      };
    }

    log.info("Passages retrieved", { category, passageCount: passages.length });

    // Step 2: Augment
    const prompt = buildAnswerPrompt(this.brandName, category, trimmed, passages);

    // Step 3: Generate
    let response: string;
    try {
      response = await this.completion.completeText(prompt, { signal, requestId });
    } catch (err) {
      log.warn("Generation failed", { error: err });
      return {
        ok: false,
        error: isSupportBotError(err, "RUN_CANCELLED")
          ? err
          : generationError(`Generation failed: ${describeCause(err)}`, requestId, err),
        retrievedPassages: passages,
      };
    }

    if (!response.trim()) {
      log.warn("Generation returned an empty response");
      return { ok: false, error: emptyResponseError(requestId), retrievedPassages: passages };
    }

    log.info("Response generated", { responseLength: response.length });

    return { ok: true, response, retrievedPassages: passages };
  }
}
