/**
 * Signed upload sessions for recordings
 *
 * The client asks for an upload URL, PUTs the raw bytes to it before it
 * expires, then references the returned file URL from an event.
 * Sessions live in memory; files live under UPLOAD_DIR.
 */

import crypto from "crypto";
import express, { type Express, type Request } from "express";
import { mkdir, writeFile, access } from "fs/promises";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import { uploadRecordingRequestSchema } from "@shared/schema";
import { getUserId, requireUser } from "./deviceAuth";
import { log } from "./logger";
import { HttpError, asyncHandler, parseBody } from "./middleware/apiValidation";
import type { Clock } from "./pipeline/types";
import type { AppDeps } from "./routes";

const MAX_UPLOAD_BYTES = "200mb";

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  "audio/m4a": "m4a",
  "audio/mp4": "mp4",
  "audio/webm": "webm",
  "video/mp4": "mp4",
};

export interface UploadSession {
  id: string;
  token: string;
  userId: string;
  contentType: string;
  expiresAt: number;
  filePath: string;
}

export function safeExtension(contentType: string, filename: string | null | undefined): string {
  const dot = filename ? filename.lastIndexOf(".") : -1;
  if (filename && dot >= 0) {
    const ext = filename.slice(dot + 1).toLowerCase();
    if (/^[a-z0-9]{1,10}$/.test(ext)) {
      return ext;
    }
  }
  return CONTENT_TYPE_EXTENSIONS[contentType] ?? "bin";
}

export class UploadSessionStore {
  private readonly sessions = new Map<string, UploadSession>();

  constructor(
    private readonly uploadDir: string,
    private readonly expiresMs: number,
    private readonly clock: Clock
  ) {}

  create(userId: string, contentType: string, filename: string | null | undefined): UploadSession {
    const id = uuidv4();
    const session: UploadSession = {
      id,
      token: uuidv4(),
      userId,
      contentType,
      expiresAt: this.clock.now() + this.expiresMs,
      filePath: path.resolve(this.uploadDir, `${id}.${safeExtension(contentType, filename)}`),
    };
    this.sessions.set(id, session);
    return session;
  }

  get(id: string): UploadSession | undefined {
    return this.sessions.get(id);
  }

  isExpired(session: UploadSession): boolean {
    return this.clock.now() > session.expiresAt;
  }

  delete(id: string): void {
    this.sessions.delete(id);
  }
}

function tokenMatches(expected: string, provided: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

function baseUrl(req: Request): string {
  return `${req.protocol}://${req.get("host") ?? "localhost"}`;
}

export function registerUploadRoutes(app: Express, deps: AppDeps): void {
  const { tokens, config, clock } = deps;
  const auth = requireUser(tokens);
  const sessions = new UploadSessionStore(config.uploadDir, config.uploadExpiresMinutes * 60 * 1000, clock);

  app.post("/v1/uploads/recording", auth, asyncHandler(async (req, res) => {
    const userId = getUserId(res);
    const body = parseBody(uploadRecordingRequestSchema, req);
    const session = sessions.create(userId, body.content_type, body.filename);

    const base = baseUrl(req);
    res.json({
      uploadUrl: `${base}/v1/uploads/recording/${session.id}?token=${session.token}`,
      fileUrl: `${base}/v1/uploads/files/${session.id}`,
      expiresAt: new Date(session.expiresAt).toISOString(),
    });
  }));

  app.put(
    "/v1/uploads/recording/:id",
    express.raw({ type: () => true, limit: MAX_UPLOAD_BYTES }),
    asyncHandler(async (req, res) => {
      const session = sessions.get(req.params.id);
      if (!session) {
        throw new HttpError(404, "Upload session not found");
      }
      const token = typeof req.query.token === "string" ? req.query.token : "";
      if (!tokenMatches(session.token, token)) {
        throw new HttpError(403, "Invalid upload token");
      }
      if (sessions.isExpired(session)) {
        sessions.delete(session.id);
        throw new HttpError(410, "Upload URL expired");
      }

      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        throw new HttpError(400, "Empty upload body");
      }

      await mkdir(path.dirname(session.filePath), { recursive: true });
      await writeFile(session.filePath, body);
      log(`Upload ${session.id} stored (${body.length} bytes)`, "uploads");

      res.json({ message: "Upload completed", fileUrl: `/v1/uploads/files/${session.id}` });
    })
  );

  app.get("/v1/uploads/files/:id", asyncHandler(async (req, res) => {
    const session = sessions.get(req.params.id);
    if (!session) {
      throw new HttpError(404, "File not found");
    }
    try {
      await access(session.filePath);
    } catch {
      throw new HttpError(404, "File not found");
    }
    res.type(session.contentType);
    res.sendFile(session.filePath);
  }));
}
