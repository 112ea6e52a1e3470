/**
 * Gemini batch transcriber
 *
 * Downloads a recorded clip and sends it inline to Gemini's native
 * generateContent endpoint. Failures are classified so the pipeline can
 * retry transient ones: 408/429/5xx and network errors are transient;
 * missing, empty or oversized audio and other 4xx responses are permanent.
 */

import { z } from "zod";
import { isTransientStatus } from "../../lib/reliability";
import { log } from "../logger";
import { TranscriptionError, describeError } from "../pipeline/errors";
import type { Transcriber } from "../pipeline/types";
import { GEMINI_NATIVE_BASE_URL } from "../services/gemini";

const TRANSCRIBE_PROMPT = [
  "Transcribe this audio into plain text.",
  "Rules:",
  "- Output only the transcript text.",
  "- Keep original language.",
  "- Do not add explanations.",
  "- If speech is unclear, output your best-effort transcript.",
].join("\n");

const generateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
      })
    )
    .optional(),
});

export interface GeminiTranscriberOptions {
  apiKey: string;
  model: string;
  maxAudioBytes: number;
  fetchImpl?: typeof fetch;
}

export function guessAudioMime(contentType: string | null): string {
  const mime = (contentType ?? "").split(";")[0].trim().toLowerCase();
  return mime.startsWith("audio/") ? mime : "audio/webm";
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

function statusError(what: string, status: number): TranscriptionError {
  return new TranscriptionError(
    `${what} failed with status ${status}`,
    isTransientStatus(status) ? "transient" : "permanent"
  );
}

export class GeminiTranscriber implements Transcriber {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GeminiTranscriberOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async transcribe(audioUrl: string, signal: AbortSignal): Promise<string> {
    if (!audioUrl) {
      throw new TranscriptionError("Event has no audio reference", "permanent");
    }
    if (!isHttpUrl(audioUrl)) {
      throw new TranscriptionError(`Invalid audio URL: ${audioUrl}`, "permanent");
    }
    if (!this.options.apiKey) {
      throw new TranscriptionError("STT is not enabled: GEMINI_API_KEY is missing", "permanent");
    }

    const { bytes, mimeType } = await this.download(audioUrl, signal);
    const response = await this.request(`${GEMINI_NATIVE_BASE_URL}/${this.options.model}:generateContent`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-goog-api-key": this.options.apiKey,
      },
      body: JSON.stringify({
        contents: [
          {
            parts: [
              { text: TRANSCRIBE_PROMPT },
              { inline_data: { mime_type: mimeType, data: bytes.toString("base64") } },
            ],
          },
        ],
        generationConfig: { temperature: 0.0 },
      }),
      signal,
    });

    if (!response.ok) {
      throw statusError("Gemini transcription", response.status);
    }

    const parsed = generateContentResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new TranscriptionError("Gemini transcription returned an unexpected body", "permanent");
    }

    const transcript = parsed.data.candidates?.[0]?.content?.parts?.[0]?.text?.trim() ?? "";
    log(`STT request succeeded with model=${this.options.model} (${bytes.length} bytes)`, "stt");
    return transcript;
  }

  private async download(audioUrl: string, signal: AbortSignal): Promise<{ bytes: Buffer; mimeType: string }> {
    const response = await this.request(audioUrl, { redirect: "follow", signal });
    if (!response.ok) {
      throw statusError("Audio download", response.status);
    }

    const bytes = Buffer.from(await response.arrayBuffer());
    if (bytes.length === 0) {
      throw new TranscriptionError("Audio file is empty", "permanent");
    }
    if (bytes.length > this.options.maxAudioBytes) {
      throw new TranscriptionError(`Audio too large for STT (${bytes.length} bytes)`, "permanent");
    }

    return { bytes, mimeType: guessAudioMime(response.headers.get("content-type")) };
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(url, init);
    } catch (error) {
      throw new TranscriptionError(`Request to ${new URL(url).host} failed: ${describeError(error)}`, "transient", {
        cause: error,
      });
    }
  }
}
