import { createServer } from "http";
import { log, logError } from "./logger";
import { createDatabase } from "./db";
import { createReadinessCheck } from "./src/db/health";
import { aiEnabled, getEnv, toPipelineConfig } from "./src/config/env";
import { createTokenService } from "./deviceAuth";
import { PgStorage } from "./storage";
import { createPipeline, systemClock } from "./pipeline";
import { startPipelineSweep, stopPipelineSweep } from "./jobs/pipelineSweep";
import { GeminiJsonModel, requireGemini3Model } from "./services/gemini";
import { EggCommenter, EggbookExtractor } from "./services/eggbookExtractor";
import { GeminiTranscriber } from "./stt";
import { createApp } from "./routes";

const DAY_MS = 24 * 60 * 60 * 1000;

const env = getEnv();
const { pool, db } = createDatabase(env.DATABASE_URL);
const storage = new PgStorage(db);
const config = toPipelineConfig(env);
const enabled = aiEnabled(env);

const model = enabled ? requireGemini3Model(env.GEMINI_MODEL) : env.GEMINI_MODEL;
const jsonModel = new GeminiJsonModel(env.GEMINI_API_KEY, model);

const pipeline = createPipeline({
  events: storage,
  eggbook: storage,
  comments: storage,
  transcriber: new GeminiTranscriber({
    apiKey: env.GEMINI_API_KEY,
    model: env.GEMINI_STT_MODEL || model,
    maxAudioBytes: env.STT_MAX_AUDIO_BYTES,
  }),
  extractor: new EggbookExtractor(jsonModel),
  commenter: enabled ? new EggCommenter(jsonModel) : null,
  config,
  clock: systemClock,
});

const app = createApp({
  storage,
  tokens: createTokenService({ secret: env.TOKEN_SECRET, ttlMs: env.TOKEN_TTL_DAYS * DAY_MS }),
  pipeline,
  config: {
    appName: env.APP_NAME,
    aiEnabled: enabled,
    eventDebugEnabled: env.EVENT_DEBUG_ENABLED,
    batchTriggerCount: env.AUDIO_BATCH_TRIGGER_COUNT,
    batchMaxWaitHours: env.AUDIO_BATCH_MAX_WAIT_HOURS,
    maxEventAttempts: env.AI_MAX_EVENT_ATTEMPTS,
    commentRetentionDays: env.COMMENT_RETENTION_DAYS,
    uploadDir: env.UPLOAD_DIR,
    uploadExpiresMinutes: env.UPLOAD_EXPIRES_MINUTES,
  },
  clock: systemClock,
  dbReady: createReadinessCheck(pool),
});

if (enabled) {
  startPipelineSweep(pipeline.scheduler, {
    cronExpression: env.PIPELINE_SWEEP_CRON,
    transcribingGraceMs: config.transcribingGraceMs,
  });
  log(`AI pipeline enabled with model=${model}`, "startup");
} else {
  log("AI pipeline disabled - GEMINI_API_KEY not configured", "startup");
}

const httpServer = createServer(app);
httpServer.listen({ port: env.PORT, host: "0.0.0.0" }, () => {
  log(`serving on port ${env.PORT}`);
});

async function shutdown(signal: string): Promise<void> {
  log(`${signal} received, shutting down`, "startup");
  stopPipelineSweep();
  httpServer.close();
  try {
    await pipeline.scheduler.whenIdle();
    await pool.end();
  } catch (error) {
    logError("Shutdown did not complete cleanly", "startup", error);
  }
  process.exit(0);
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
