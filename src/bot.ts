// ============================================
// Composition root: builds the pipeline from config
// Owns the OpenAI and Supabase handles for the process lifetime
// ============================================

import OpenAI from "openai";
import { loadConfig, type AppConfig } from "./config/env.js";
import { logger } from "./lib/logger.js";
import { coreUnavailableError, isSupportBotError } from "./lib/errors.js";
import {
  chatApiFrom,
  CLASSIFIER_TEMPERATURE,
  OpenAICompletionClient,
  RESPONDER_TEMPERATURE,
} from "./llm/client.js";
import type { TextCompletionPort } from "./llm/completion.js";
import { createQueryEmbedder, embeddingsApiFrom } from "./retrieval/embeddings.js";
import { SupabaseRetriever } from "./retrieval/supabaseRetriever.js";
import type { PassageRetriever } from "./retrieval/retriever.js";
import { createSupabaseClient, vectorStoreFrom } from "./db/supabase.js";
import { Classifier } from "./router/classifier.js";
import { Responder } from "./answer/responder.js";
import { SupportPipeline } from "./app/pipeline.js";

/**
 * Ports the pipeline needs.
 * Production builds them from config; tests pass in-process doubles.
 */
export type SupportBotPorts = {
  classifierCompletion: TextCompletionPort;
  responderCompletion: TextCompletionPort;
  retriever: PassageRetriever;
};

export function createProductionPorts(config: AppConfig): SupportBotPorts {
  const openai = new OpenAI({ apiKey: config.openai.apiKey, maxRetries: 0 });
  const chatApi = chatApiFrom(openai);

  const supabase = createSupabaseClient(config.supabase);

  return {
    classifierCompletion: new OpenAICompletionClient(chatApi, {
      model: config.openai.classifierModel,
      temperature: CLASSIFIER_TEMPERATURE,
      timeoutMs: config.openai.timeoutMs,
      maxTokens: 200,
    }),
    responderCompletion: new OpenAICompletionClient(chatApi, {
      model: config.openai.responderModel,
      temperature: RESPONDER_TEMPERATURE,
      timeoutMs: config.openai.timeoutMs,
    }),
    retriever: new SupabaseRetriever({
      store: vectorStoreFrom(supabase),
      embed: createQueryEmbedder(embeddingsApiFrom(openai), config.openai.embeddingModel),
      rpcName: config.supabase.matchRpc,
      timeoutMs: config.retrieval.timeoutMs,
    }),
  };
}

/**
 * Wire classifier, responder and escalation into one pipeline.
 */
export function createSupportBot(config: AppConfig, ports: SupportBotPorts = createProductionPorts(config)): SupportPipeline {
  const classifier = new Classifier({
    completion: ports.classifierCompletion,
    brandName: config.brandName,
  });

  const responder = new Responder({
    completion: ports.responderCompletion,
    retriever: ports.retriever,
    brandName: config.brandName,
    topK: config.retrieval.topK,
  });

  logger.info("Support bot ready", {
    stage: "startup",
    confidenceThreshold: config.routing.confidenceThreshold,
    topK: config.retrieval.topK,
    classifierModel: config.openai.classifierModel,
    responderModel: config.openai.responderModel,
  });

  return new SupportPipeline({
    classifier,
    responder,
    confidenceThreshold: config.routing.confidenceThreshold,
    contact: config.support,
    brandName: config.brandName,
  });
}

/**
 * Build the bot from environment variables.
 * Missing or invalid configuration is the one catastrophic failure: CORE_UNAVAILABLE.
 */
export function createSupportBotFromEnv(
  source: Record<string, string | undefined> = process.env,
  ports?: SupportBotPorts
): SupportPipeline {
  let config: AppConfig;
  try {
    config = loadConfig(source);
  } catch (err) {
    logger.error("Invalid configuration, support bot unavailable", { stage: "config", error: err });
    const detail = isSupportBotError(err) ? err.message : String(err);
    throw coreUnavailableError(`Support bot unavailable: ${detail}`, err);
  }

  return createSupportBot(config, ports);
}
