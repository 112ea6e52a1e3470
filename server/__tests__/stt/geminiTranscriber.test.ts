import { describe, it, expect, vi } from "vitest";
import { TranscriptionError } from "../../pipeline/errors";
import { GEMINI_NATIVE_BASE_URL } from "../../services/gemini";
import { GeminiTranscriber, guessAudioMime } from "../../stt";

const AUDIO = "https://files.test/clip.m4a";
const signal = new AbortController().signal;

function geminiReply(text: string): Response {
  return Response.json({ candidates: [{ content: { parts: [{ text }] } }] });
}

function fakeFetch(routes: { audio: () => Response; gemini?: () => Response }) {
  return vi.fn<typeof fetch>(async (input) => {
    const url = String(input);
    if (url.startsWith(GEMINI_NATIVE_BASE_URL)) {
      return routes.gemini ? routes.gemini() : new Response("unexpected", { status: 500 });
    }
    return routes.audio();
  });
}

function transcriber(fetchImpl: typeof fetch, overrides: { apiKey?: string; maxAudioBytes?: number } = {}) {
  return new GeminiTranscriber({
    apiKey: overrides.apiKey ?? "test-key",
    model: "gemini-3-pro-preview",
    maxAudioBytes: overrides.maxAudioBytes ?? 1024,
    fetchImpl,
  });
}

function audioClip(): Response {
  return new Response(new Uint8Array([1, 2, 3]), { headers: { "content-type": "audio/mp4; codecs=mp4a" } });
}

describe("GeminiTranscriber", () => {
  it("sends the clip inline and returns the trimmed transcript", async () => {
    const fetchImpl = fakeFetch({ audio: audioClip, gemini: () => geminiReply("  call Alex tomorrow \n") });

    await expect(transcriber(fetchImpl).transcribe(AUDIO, signal)).resolves.toBe("call Alex tomorrow");

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    const [url, init] = fetchImpl.mock.calls[1];
    expect(url).toBe(`${GEMINI_NATIVE_BASE_URL}/gemini-3-pro-preview:generateContent`);
    expect(init?.headers).toMatchObject({ "x-goog-api-key": "test-key" });
    const body = JSON.parse(String(init?.body));
    expect(body.contents[0].parts[1]).toEqual({ inline_data: { mime_type: "audio/mp4", data: "AQID" } });
    expect(body.generationConfig).toEqual({ temperature: 0 });
  });

  it("returns an empty string when the model says nothing", async () => {
    const fetchImpl = fakeFetch({ audio: audioClip, gemini: () => Response.json({ candidates: [] }) });
    await expect(transcriber(fetchImpl).transcribe(AUDIO, signal)).resolves.toBe("");
  });

  it("marks provider overload as transient", async () => {
    const fetchImpl = fakeFetch({ audio: audioClip, gemini: () => new Response("busy", { status: 503 }) });

    const failure = transcriber(fetchImpl).transcribe(AUDIO, signal);

    await expect(failure).rejects.toBeInstanceOf(TranscriptionError);
    await expect(failure).rejects.toMatchObject({ kind: "transient" });
  });

  it("marks a missing clip as permanent", async () => {
    const fetchImpl = fakeFetch({ audio: () => new Response("gone", { status: 404 }) });
    await expect(transcriber(fetchImpl).transcribe(AUDIO, signal)).rejects.toMatchObject({
      kind: "permanent",
      message: "Audio download failed with status 404",
    });
  });

  it("rejects empty and oversized clips without calling the model", async () => {
    const empty = fakeFetch({ audio: () => new Response(new Uint8Array(0)) });
    await expect(transcriber(empty).transcribe(AUDIO, signal)).rejects.toMatchObject({
      kind: "permanent",
      message: "Audio file is empty",
    });

    const large = fakeFetch({ audio: audioClip });
    await expect(transcriber(large, { maxAudioBytes: 2 }).transcribe(AUDIO, signal)).rejects.toMatchObject({
      kind: "permanent",
      message: "Audio too large for STT (3 bytes)",
    });
    expect(large).toHaveBeenCalledTimes(1);
  });

  it("fails permanently on a bad URL or a missing key", async () => {
    const fetchImpl = fakeFetch({ audio: audioClip });

    await expect(transcriber(fetchImpl).transcribe("ftp://files.test/clip.m4a", signal)).rejects.toMatchObject({
      kind: "permanent",
    });
    await expect(transcriber(fetchImpl, { apiKey: "" }).transcribe(AUDIO, signal)).rejects.toMatchObject({
      kind: "permanent",
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("treats network errors as transient", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(transcriber(fetchImpl).transcribe(AUDIO, signal)).rejects.toMatchObject({
      kind: "transient",
      message: "Request to files.test failed: fetch failed",
    });
  });
});

describe("guessAudioMime", () => {
  it("keeps audio types and falls back to webm", () => {
    expect(guessAudioMime("audio/mp4; codecs=mp4a")).toBe("audio/mp4");
    expect(guessAudioMime("application/octet-stream")).toBe("audio/webm");
    expect(guessAudioMime(null)).toBe("audio/webm");
  });
});
