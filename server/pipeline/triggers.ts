/**
 * Trigger classification for ingested events.
 *
 * Pure functions: no I/O, safe to call from request handlers and the
 * debug endpoint alike.
 */

import type { EventRecord } from "@shared/schema";

export type InferencePath = "single" | "batch" | "none";

export interface TriggerPlan {
  needsTranscription: boolean;
  path: InferencePath;
}

function present(value: string | null | undefined): boolean {
  return (value ?? "").trim().length > 0;
}

/** Screen recording reference, falling back to the deprecated alias. */
export function screenRecordingOf(event: Pick<EventRecord, "screenRecordingUrl" | "recordingUrl">): string | null {
  const url = (event.screenRecordingUrl || event.recordingUrl || "").trim();
  return url.length > 0 ? url : null;
}

export function hasTranscript(event: Pick<EventRecord, "transcript">): boolean {
  return present(event.transcript);
}

export function hasAudio(event: Pick<EventRecord, "audioUrl">): boolean {
  return present(event.audioUrl);
}

export function hasMedia(event: EventRecord): boolean {
  return hasAudio(event) || screenRecordingOf(event) !== null;
}

export function hasAnyInput(event: EventRecord): boolean {
  return hasMedia(event) || hasTranscript(event);
}

export function needsTranscription(event: EventRecord): boolean {
  return !hasTranscript(event) && hasAudio(event);
}

export function isRunnable(event: EventRecord, maxAttempts: number): boolean {
  return event.status !== "processed" && event.aiAttempts < maxAttempts;
}

/**
 * A screen recording always means single inference; otherwise an event with
 * a transcript (or audio that will become one) accumulates for batching.
 */
export function classifyEvent(event: EventRecord, maxAttempts: number): TriggerPlan {
  const transcription = needsTranscription(event);

  if (!isRunnable(event, maxAttempts)) {
    return { needsTranscription: false, path: "none" };
  }
  if (screenRecordingOf(event) !== null) {
    return { needsTranscription: transcription, path: "single" };
  }
  if (hasTranscript(event) || transcription) {
    return { needsTranscription: transcription, path: "batch" };
  }
  return { needsTranscription: false, path: "none" };
}
