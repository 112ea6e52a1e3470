/**
 * Gemini client
 *
 * Text generation goes through the OpenAI SDK pointed at Gemini's
 * OpenAI-compatible endpoint; the same error classification feeds the
 * pipeline's retry policy for both extraction and transcription.
 */

import OpenAI from "openai";
import { getErrorStatus, isRetryableError, isTransientStatus } from "../../lib/reliability";
import type { FailureKind } from "../pipeline/errors";

export const GEMINI_OPENAI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/openai/";
export const GEMINI_NATIVE_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/models";

const MIN_RETRY_AFTER_MS = 500;

export interface JsonModel {
  /** Sends one prompt and returns the parsed JSON body of the reply. */
  completeJson(prompt: string, signal: AbortSignal): Promise<unknown>;
}

export interface ClassifiedAiError {
  kind: FailureKind;
  status: number | null;
  retryAfterMs: number | null;
}

export function requireGemini3Model(model: string): string {
  const normalized = model.trim();
  if (!normalized) {
    throw new Error("GEMINI_MODEL is empty");
  }
  if (!normalized.startsWith("gemini-3")) {
    throw new Error(`Gemini 3 only mode enabled. Invalid model: ${normalized}`);
  }
  return normalized;
}

/** Retry-After is given in seconds; very small values are floored. */
export function parseRetryAfterMs(value: string | null | undefined): number | null {
  if (value === null || value === undefined || value.trim() === "") {
    return null;
  }
  const seconds = Number(value);
  if (!Number.isFinite(seconds)) {
    return null;
  }
  return Math.max(seconds * 1000, MIN_RETRY_AFTER_MS);
}

/** Models sometimes wrap JSON in a markdown fence despite being asked not to. */
export function stripJsonFence(text: string): string {
  let body = text.trim();
  if (body.startsWith("```")) {
    body = body.replace(/^`+/, "").replace(/`+$/, "").trim();
    if (body.toLowerCase().startsWith("json")) {
      body = body.slice(4).trim();
    }
  }
  return body;
}

export function classifyAiError(error: unknown): ClassifiedAiError {
  if (error instanceof OpenAI.APIUserAbortError || error instanceof OpenAI.APIConnectionError) {
    return { kind: "transient", status: null, retryAfterMs: null };
  }

  if (error instanceof OpenAI.APIError) {
    const status = error.status ?? null;
    const retryAfterMs = parseRetryAfterMs(error.headers?.["retry-after"]);
    const transient = status === null || isTransientStatus(status);
    return { kind: transient ? "transient" : "permanent", status, retryAfterMs: transient ? retryAfterMs : null };
  }

  if (error instanceof SyntaxError) {
    return { kind: "permanent", status: null, retryAfterMs: null };
  }

  const status = getErrorStatus(error) ?? null;
  return { kind: isRetryableError(error) ? "transient" : "permanent", status, retryAfterMs: null };
}

let client: OpenAI | null = null;
let clientKey: string | null = null;

export function getGeminiClient(apiKey: string): OpenAI {
  if (!apiKey) {
    throw new Error("GEMINI_API_KEY is not configured");
  }
  if (!client || clientKey !== apiKey) {
    // Retries are owned by the pipeline's retry wrapper
    client = new OpenAI({ apiKey, baseURL: GEMINI_OPENAI_BASE_URL, maxRetries: 0 });
    clientKey = apiKey;
  }
  return client;
}

export class GeminiJsonModel implements JsonModel {
  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    private readonly temperature = 0.2
  ) {}

  async completeJson(prompt: string, signal: AbortSignal): Promise<unknown> {
    const response = await getGeminiClient(this.apiKey).chat.completions.create(
      {
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        temperature: this.temperature,
        response_format: { type: "json_object" },
      },
      { signal }
    );

    const text = response.choices[0]?.message?.content ?? "";
    if (!text.trim()) {
      throw new SyntaxError("Gemini returned empty content");
    }
    return JSON.parse(stripJsonFence(text));
  }
}
