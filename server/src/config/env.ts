/**
 * Centralized Environment Configuration
 *
 * Fail-fast Zod validation for all environment variables.
 * Call getEnv() early in startup to catch missing config before the server listens.
 */

import { z } from "zod";
import type { PipelineConfig } from "../../pipeline/types";

const AppEnvSchema = z.enum(["development", "staging", "production", "test"]);
const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const flag = z
  .string()
  .optional()
  .transform((value) => value === "1" || value?.toLowerCase() === "true");

const EnvSchema = z.object({
  APP_NAME: z.string().min(1).default("egg-backend"),
  APP_ENV: AppEnvSchema.default("development"),
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: LogLevelSchema.default("info"),

  DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),
  TOKEN_SECRET: z.string().min(1, "TOKEN_SECRET is required"),
  TOKEN_TTL_DAYS: z.coerce.number().positive().default(30),

  GEMINI_API_KEY: z.string().default(""),
  GEMINI_MODEL: z.string().min(1).default("gemini-3-pro-preview"),
  GEMINI_STT_MODEL: z.string().optional(),
  STT_MAX_AUDIO_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),

  AI_USER_COOLDOWN_SEC: z.coerce.number().nonnegative().default(8),
  AUDIO_BATCH_TRIGGER_COUNT: z.coerce.number().int().positive().default(5),
  AUDIO_BATCH_MAX_WAIT_HOURS: z.coerce.number().nonnegative().default(12),
  AI_QUEUE_MAX_EVENTS_PER_RUN: z.coerce.number().int().positive().default(20),
  AI_MAX_EVENT_ATTEMPTS: z.coerce.number().int().positive().default(3),
  GEMINI_REQUEST_TIMEOUT_SEC: z.coerce.number().positive().default(60),
  GEMINI_RETRY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(4),
  GEMINI_RETRY_BASE_DELAY_SEC: z.coerce.number().nonnegative().default(1.0),
  TRANSCRIBING_GRACE_MINUTES: z.coerce.number().positive().default(15),
  PIPELINE_SWEEP_CRON: z.string().min(1).default("* * * * *"),
  DAILY_COMMENT_MIN_ACTIVE_SEC: z.coerce.number().nonnegative().default(3600),
  COMMENT_RETENTION_DAYS: z.coerce.number().int().positive().default(7),

  EVENT_DEBUG_ENABLED: flag,
  UPLOAD_DIR: z.string().min(1).default("/tmp/egg_uploads"),
  UPLOAD_EXPIRES_MINUTES: z.coerce.number().int().positive().default(15),
});

export type Env = z.infer<typeof EnvSchema>;
export type AppEnv = z.infer<typeof AppEnvSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

export type EnvParseResult =
  | { success: true; env: Env }
  | { success: false; missing: string[]; invalid: string[] };

export function parseEnv(source: Record<string, string | undefined>): EnvParseResult {
  const result = EnvSchema.safeParse(source);
  if (result.success) {
    return { success: true, env: result.data };
  }

  const missing: string[] = [];
  const invalid: string[] = [];
  for (const issue of result.error.issues) {
    const path = issue.path.join(".");
    if (issue.code === "invalid_type" && issue.received === "undefined") {
      missing.push(path);
    } else {
      invalid.push(`${path}: ${issue.message}`);
    }
  }
  return { success: false, missing, invalid };
}

let _env: Env | null = null;

function validateEnv(): Env {
  const result = parseEnv(process.env);

  if (!result.success) {
    const errorMessages: string[] = [];

    if (result.missing.length > 0) {
      errorMessages.push(`Missing required environment variables:\n  - ${result.missing.join("\n  - ")}`);
    }

    if (result.invalid.length > 0) {
      errorMessages.push(`Invalid environment variables:\n  - ${result.invalid.join("\n  - ")}`);
    }

    console.error(
      `\n${"=".repeat(60)}\nENVIRONMENT CONFIGURATION ERROR\n${"=".repeat(60)}\n\n${errorMessages.join("\n\n")}\n\nRefer to .env.example for the supported variables.\n${"=".repeat(60)}\n`
    );
    process.exit(1);
  }

  return result.env;
}

export function getEnv(): Env {
  if (!_env) {
    _env = validateEnv();
  }
  return _env;
}

export function isProduction(): boolean {
  return getEnv().APP_ENV === "production" || getEnv().NODE_ENV === "production";
}

export function aiEnabled(env: Env = getEnv()): boolean {
  return env.GEMINI_API_KEY.trim().length > 0;
}

/**
 * Pipeline knobs in the units the pipeline works in (milliseconds).
 */
export function toPipelineConfig(env: Env): PipelineConfig {
  return {
    cooldownMs: env.AI_USER_COOLDOWN_SEC * 1000,
    batchTriggerCount: env.AUDIO_BATCH_TRIGGER_COUNT,
    batchMaxWaitMs: env.AUDIO_BATCH_MAX_WAIT_HOURS * 60 * 60 * 1000,
    maxEventsPerRun: env.AI_QUEUE_MAX_EVENTS_PER_RUN,
    maxEventAttempts: env.AI_MAX_EVENT_ATTEMPTS,
    requestTimeoutMs: env.GEMINI_REQUEST_TIMEOUT_SEC * 1000,
    retryMaxAttempts: env.GEMINI_RETRY_MAX_ATTEMPTS,
    retryBaseDelayMs: env.GEMINI_RETRY_BASE_DELAY_SEC * 1000,
    transcribingGraceMs: env.TRANSCRIBING_GRACE_MINUTES * 60 * 1000,
    dailyCommentMinActiveSec: env.DAILY_COMMENT_MIN_ACTIVE_SEC,
    commentRetentionDays: env.COMMENT_RETENTION_DAYS,
  };
}
