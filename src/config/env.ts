import { z } from "zod";
import { configError } from "../lib/errors.js";

// ============================================
// Environment configuration with validation
// Read once at process start; immutable afterwards
// ============================================

// Unset or blank falls back to the default
const numberFromEnv = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((value) => Number(value?.trim() || fallback));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // OpenAI
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  CLASSIFIER_MODEL: z.string().min(1).default("gpt-4o-mini"),
  RESPONDER_MODEL: z.string().min(1).default("gpt-4o-mini"),
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  LLM_TIMEOUT_MS: numberFromEnv("20000").pipe(z.number().int().positive("LLM_TIMEOUT_MS must be a positive integer")),

  // Supabase (pgvector)
  SUPABASE_URL: z.string().url("SUPABASE_URL must be a valid URL"),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, "SUPABASE_SERVICE_ROLE_KEY is required"),
  MATCH_PASSAGES_RPC: z.string().min(1).default("match_passages"),
  RETRIEVAL_TIMEOUT_MS: numberFromEnv("5000").pipe(
    z.number().int().positive("RETRIEVAL_TIMEOUT_MS must be a positive integer")
  ),

  // Routing
  CONFIDENCE_THRESHOLD: numberFromEnv("0.7").pipe(
    z
      .number({ invalid_type_error: "CONFIDENCE_THRESHOLD must be a number" })
      .min(0, "CONFIDENCE_THRESHOLD must be between 0 and 1")
      .max(1, "CONFIDENCE_THRESHOLD must be between 0 and 1")
  ),
  TOP_K_DOCS: numberFromEnv("4").pipe(z.number().int().positive("TOP_K_DOCS must be a positive integer")),

  // Escalation contact
  BRAND_NAME: z.string().min(1).default("TechGear Electronics"),
  SUPPORT_EMAIL: z.string().email("SUPPORT_EMAIL must be an email address").default("support@techgear.com"),
  SUPPORT_HOURS: z.string().min(1).default("Mon-Sat, 9AM-6PM IST"),
  SUPPORT_RESPONSE_TIME: z.string().min(1).default("24 hours"),
});

export type Env = z.infer<typeof envSchema>;

type EnvSource = Record<string, string | undefined>;

/**
 * Validate an environment map.
 * Throws CONFIG_ERROR naming every invalid variable.
 */
export function parseEnv(source: EnvSource): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw configError(`Invalid environment configuration: ${issues.join("; ")}`, { issues });
  }

  return result.data;
}

/** Derived, nested config */
export function loadConfig(source: EnvSource = process.env) {
  const env = parseEnv(source);

  return {
    isDev: env.NODE_ENV === "development",
    isProd: env.NODE_ENV === "production",
    brandName: env.BRAND_NAME,

    openai: {
      apiKey: env.OPENAI_API_KEY,
      classifierModel: env.CLASSIFIER_MODEL,
      responderModel: env.RESPONDER_MODEL,
      embeddingModel: env.EMBEDDING_MODEL,
      timeoutMs: env.LLM_TIMEOUT_MS,
    },

    supabase: {
      url: env.SUPABASE_URL,
      serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
      matchRpc: env.MATCH_PASSAGES_RPC,
    },

    routing: {
      confidenceThreshold: env.CONFIDENCE_THRESHOLD,
    },

    retrieval: {
      topK: env.TOP_K_DOCS,
      timeoutMs: env.RETRIEVAL_TIMEOUT_MS,
    },

    support: {
      email: env.SUPPORT_EMAIL,
      hours: env.SUPPORT_HOURS,
      responseTime: env.SUPPORT_RESPONSE_TIME,
    },
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;
