/**
 * Anonymous device auth
 *
 * Bearer tokens are `<userId>.<expiresAtMs>.<hmac>` signed with TOKEN_SECRET.
 * A user is created on first launch; devices and memories hang off it.
 */

import crypto from "crypto";
import type { Express, Request, Response, NextFunction } from "express";
import { deviceRegistrationSchema, insertMemorySchema } from "@shared/schema";
import { log } from "./logger";
import { HttpError, asyncHandler, parseBody } from "./middleware/apiValidation";
import type { AppStorage } from "./storage";

export interface TokenServiceOptions {
  secret: string;
  ttlMs: number;
  now?: () => number;
}

export interface TokenService {
  sign(userId: string): string;
  /** Returns the user id, or null for a malformed, forged or expired token. */
  verify(token: string): string | null;
}

function computeSignature(userId: string, expiresAt: string, secret: string): string {
  return crypto.createHmac("sha256", secret).update(`${userId}.${expiresAt}`).digest("hex");
}

function safeCompare(a: string, b: string): boolean {
  const bufA = Buffer.from(a);
  const bufB = Buffer.from(b);
  if (bufA.length !== bufB.length) return false;
  return crypto.timingSafeEqual(bufA, bufB);
}

export function createTokenService(options: TokenServiceOptions): TokenService {
  const now = options.now ?? Date.now;

  return {
    sign(userId: string): string {
      const expiresAt = String(now() + options.ttlMs);
      return `${userId}.${expiresAt}.${computeSignature(userId, expiresAt, options.secret)}`;
    },

    verify(token: string): string | null {
      const parts = token.split(".");
      if (parts.length !== 3) return null;

      const [userId, expiresAt, signature] = parts;
      if (!userId || !/^\d+$/.test(expiresAt)) return null;
      if (!safeCompare(signature, computeSignature(userId, expiresAt, options.secret))) return null;
      if (Number(expiresAt) <= now()) return null;

      return userId;
    },
  };
}

/**
 * Rejects requests without a valid `Authorization: Bearer <token>` header
 * and stores the caller's user id for getUserId().
 */
export function requireUser(tokens: TokenService) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization ?? "";
    if (!header.startsWith("Bearer ")) {
      res.status(401).json({ error: "Invalid token" });
      return;
    }

    const userId = tokens.verify(header.slice("Bearer ".length).trim());
    if (!userId) {
      res.status(401).json({ error: "Invalid token" });
      return;
    }

    res.locals.userId = userId;
    next();
  };
}

export function getUserId(res: Response): string {
  const userId: unknown = res.locals.userId;
  if (typeof userId !== "string") {
    throw new HttpError(401, "Invalid token");
  }
  return userId;
}

export interface AuthRouteDeps {
  storage: AppStorage;
  tokens: TokenService;
}

export function registerAuthRoutes(app: Express, deps: AuthRouteDeps): void {
  const { storage, tokens } = deps;
  const auth = requireUser(tokens);

  app.post("/v1/auth/anonymous", asyncHandler(async (_req, res) => {
    const user = await storage.createUser();
    log(`Anonymous user created: ${user.id}`, "auth");
    res.json({ userId: user.id, token: tokens.sign(user.id) });
  }));

  app.post("/v1/devices", auth, asyncHandler(async (req, res) => {
    const userId = getUserId(res);
    const registration = parseBody(deviceRegistrationSchema, req);

    const existing = await storage.getDevice(registration.device_id);
    if (existing && existing.userId !== userId) {
      throw new HttpError(409, "Device is already linked to another user");
    }

    const device = await storage.saveDevice(userId, registration);
    res.json({ message: "Device registered", deviceId: device.id });
  }));

  app.post("/v1/memory", auth, asyncHandler(async (req, res) => {
    const userId = getUserId(res);
    const data = parseBody(insertMemorySchema, req);
    await storage.createMemory(userId, data);
    res.json({ message: "Memory saved" });
  }));
}
