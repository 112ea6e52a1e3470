import express, { type Express } from "express";
import { registerAuthRoutes, type TokenService } from "./deviceAuth";
import { registerEggbookRoutes } from "./eggbook-routes";
import { registerEventRoutes } from "./event-routes";
import { log } from "./logger";
import { apiErrorHandler, asyncHandler, notFoundHandler } from "./middleware/apiValidation";
import type { Pipeline } from "./pipeline";
import type { Clock } from "./pipeline/types";
import type { AppStorage } from "./storage";
import { registerUploadRoutes } from "./upload-routes";

export interface AppConfig {
  appName: string;
  aiEnabled: boolean;
  eventDebugEnabled: boolean;
  batchTriggerCount: number;
  batchMaxWaitHours: number;
  maxEventAttempts: number;
  commentRetentionDays: number;
  uploadDir: string;
  uploadExpiresMinutes: number;
}

export interface AppDeps {
  storage: AppStorage;
  tokens: TokenService;
  pipeline: Pick<Pipeline, "scheduler" | "dailyComments">;
  config: AppConfig;
  clock: Clock;
  /** Omitted in tests; /readyz then always reports ready. */
  dbReady?: () => Promise<boolean>;
}

const MAX_LOGGED_BODY = 400;

function requestLogger(): express.RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    const originalResJson = res.json.bind(res);
    res.json = (bodyJson?: unknown) => {
      capturedJsonResponse = bodyJson;
      return originalResJson(bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/v1")) {
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined) {
          logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
        }
        if (logLine.length > MAX_LOGGED_BODY) {
          logLine = `${logLine.slice(0, MAX_LOGGED_BODY - 1)}…`;
        }
        log(logLine);
      }
    });

    next();
  };
}

export function registerRoutes(app: Express, deps: AppDeps): void {
  const { config, dbReady } = deps;

  // Health and readiness endpoints (no auth, no logging)
  app.get("/", (_req, res) => {
    res.json({ message: `${config.appName} is running` });
  });

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, service: config.appName });
  });

  app.get("/readyz", asyncHandler(async (_req, res) => {
    const ready = dbReady ? await dbReady() : true;
    res.status(ready ? 200 : 503).json({ ready });
  }));

  app.use(requestLogger());

  registerAuthRoutes(app, deps);
  registerEventRoutes(app, deps);
  registerEggbookRoutes(app, deps);
  registerUploadRoutes(app, deps);
}

/**
 * Builds the HTTP app. Upload PUTs read their own raw body, so the JSON
 * parser only claims application/json.
 */
export function createApp(deps: AppDeps): Express {
  const app = express();
  app.disable("x-powered-by");

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  registerRoutes(app, deps);

  app.use(notFoundHandler);
  app.use(apiErrorHandler);

  return app;
}
