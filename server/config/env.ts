/**
 * Environment Configuration
 *
 * Parses process.env once at startup. Tunable defaults come from constants.ts
 * so tests and the server agree on them.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { HANDLER_CONSTANTS, TIMEOUT_CONSTANTS } from "./constants";
import { MODEL_ASSIGNMENTS } from "./models";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),

  // Model selection. Providers are detected from the model name.
  LLM_ENABLED: z.enum(["true", "false"]).default("true"),
  LLM_MODEL: z.string().default(MODEL_ASSIGNMENTS.INTENT_CLASSIFICATION),
  OPENAI_API_KEY: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),

  // Without it, chunks and interaction logs stay in memory
  DATABASE_URL: z.string().optional(),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LOG_DIR: z.string().optional(),

  WORKER_POOL_SIZE: z.coerce.number().int().min(1).default(HANDLER_CONSTANTS.WORKER_POOL_SIZE),
  COLLABORATOR_TIMEOUT_MS: z.coerce.number().int().min(1).default(TIMEOUT_CONSTANTS.COLLABORATOR_TIMEOUT_MS),
  CONTEXT_WINDOW_SIZE: z.coerce.number().int().min(1).default(HANDLER_CONSTANTS.CONTEXT_WINDOW_SIZE),
  CONTEXT_TTL_MINUTES: z.coerce.number().positive().default(HANDLER_CONSTANTS.CONTEXT_TTL_MINUTES),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  nodeEnv: Env["NODE_ENV"];
  port: number;
  llm: {
    enabled: boolean;
    model: string;
    apiKeys: {
      openai: string | undefined;
      gemini: string | undefined;
      anthropic: string | undefined;
    };
  };
  databaseUrl: string | undefined;
  logging: {
    level: Env["LOG_LEVEL"];
    dir: string | undefined;
  };
  handler: {
    workerPoolSize: number;
    collaboratorTimeoutMs: number;
    contextWindowSize: number;
    contextTtlMs: number;
  };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`[Config] Invalid environment: ${fromZodError(parsed.error).message}`);
  }
  const env = parsed.data;

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    llm: {
      enabled: env.LLM_ENABLED === "true",
      model: env.LLM_MODEL,
      apiKeys: {
        openai: env.OPENAI_API_KEY,
        gemini: env.GEMINI_API_KEY,
        anthropic: env.ANTHROPIC_API_KEY,
      },
    },
    databaseUrl: env.DATABASE_URL,
    logging: {
      level: env.LOG_LEVEL,
      dir: env.LOG_DIR,
    },
    handler: {
      workerPoolSize: env.WORKER_POOL_SIZE,
      collaboratorTimeoutMs: env.COLLABORATOR_TIMEOUT_MS,
      contextWindowSize: env.CONTEXT_WINDOW_SIZE,
      contextTtlMs: env.CONTEXT_TTL_MINUTES * 60 * 1000,
    },
  };
}
