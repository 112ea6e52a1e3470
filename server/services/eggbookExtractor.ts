/**
 * Eggbook Extractor
 *
 * Turns one event (single mode) or a chronological set of events (batch
 * mode) into eggbook entries. The model answers in strict JSON; each item
 * can carry an idea, a todo, an alert and a comment at once, and names the
 * events it came from.
 *
 * Also hosts the daily comment generator, which shares the JSON model.
 */

import { z } from "zod";
import { ExtractionError, describeError } from "../pipeline/errors";
import type {
  Commenter,
  DaySignals,
  ExtractedEntry,
  ExtractionInput,
  ExtractionMode,
  Extractor,
  GeneratedComments,
} from "../pipeline/types";
import { classifyAiError, type JsonModel } from "./gemini";

const text = z.preprocess((value) => (value === null || value === undefined ? "" : String(value).trim()), z.string());

const extractedItemSchema = z.object({
  source_event_ids: z.array(z.string()).catch([]),
  scrolling_idea_title: text,
  scrolling_idea_detail: text,
  todo_item: text,
  alert: text,
  comment: text,
});

const extractionResponseSchema = z.object({
  items: z.array(extractedItemSchema),
});

const commentsResponseSchema = z.object({
  my_egg_comment: text,
  egg_community_comment: z
    .array(z.object({ egg_name: text, egg_comment: text }))
    .nullish()
    .transform((items) => items ?? []),
});

export type ExtractedItem = z.infer<typeof extractedItemSchema>;

const ITEM_SCHEMA = `{
  "items": [
    {
      "source_event_ids": ["string"],
      "scrolling_idea_title": "string",
      "scrolling_idea_detail": "string",
      "todo_item": "string",
      "alert": "string",
      "comment": "string"
    }
  ]
}`;

function serializeInputs(inputs: ExtractionInput[]): string {
  return JSON.stringify(
    inputs.map((input) => ({
      event_id: input.eventId,
      event_at: input.eventAt,
      audio_url: input.audioUrl,
      screen_recording_url: input.screenRecordingUrl,
      transcript: input.transcript,
      duration_sec: input.durationSec,
    }))
  );
}

export function buildItemsPrompt(inputs: ExtractionInput[], mode: ExtractionMode): string {
  if (mode === "single") {
    return [
      "You are an assistant that extracts actionable productivity signals from ONE user event.",
      "Task:",
      "1) Read the event content.",
      "2) Decide what should become idea/todo/alert/comment outputs.",
      "3) Return strict JSON only, no markdown.",
      "Output JSON schema:",
      ITEM_SCHEMA,
      "Field meanings and rules:",
      "- source_event_ids: the event_id of the input event.",
      "- scrolling_idea_title: short headline for a potentially valuable idea from this event.",
      "- scrolling_idea_detail: concise explanation of that idea; include context and intent.",
      "- todo_item: one concrete, executable next action; keep imperative and specific.",
      "- alert: important risk/reminder/deadline to surface prominently.",
      "- comment: a short supportive remark about the event, or empty.",
      "- If a field has no meaningful content, use empty string.",
      "- You may output multiple items if the event contains multiple independent thoughts.",
      "- Preserve original language tone when possible.",
      `Input event JSON:\n${serializeInputs(inputs)}`,
    ].join("\n");
  }

  return [
    "You are an assistant that extracts actionable productivity signals from MULTIPLE user events.",
    "Task:",
    "1) Read all events as one context window, in the order given (oldest first).",
    "2) Merge duplicates and cluster related points.",
    "3) Return strict JSON only, no markdown.",
    "Output JSON schema:",
    ITEM_SCHEMA,
    "Field meanings and rules:",
    "- source_event_ids: event_id of every input event the item draws on, oldest first.",
    "- scrolling_idea_title: short headline for a synthesized idea across events.",
    "- scrolling_idea_detail: compact detail that combines relevant evidence from the event set.",
    "- todo_item: concrete next action derived from the strongest actionable signal.",
    "- alert: urgent caution, conflict, or time-sensitive reminder detected in the batch.",
    "- comment: a short supportive remark about the events, or empty.",
    "- If a field has no meaningful content, use empty string.",
    "- Prefer fewer, higher-quality items instead of repeating similar items.",
    "- Do not invent facts that are not grounded in the input events.",
    `Input events JSON:\n${serializeInputs(inputs)}`,
  ].join("\n");
}

export function buildCommentsPrompt(signals: DaySignals): string {
  const payload = {
    ideas: signals.ideas.map((idea) => ({ title: idea.title, detail: idea.content, created_at: idea.createdAt })),
    todos: signals.todos.map((todo) => ({ title: todo.title, isAccepted: todo.isAccepted, updated_at: todo.updatedAt })),
    alerts: signals.notifications.map((alert) => ({ alert: alert.title, notify_at: alert.notifyAt })),
  };

  return [
    "You summarize a user's day for two channels based on generated ideas/todos/alerts.",
    "Task:",
    "1) Write one personal reflection comment.",
    "2) Write community-style comments with egg personas.",
    "3) Return strict JSON only, no markdown.",
    "Schema:",
    `{
  "my_egg_comment": "string",
  "egg_community_comment": [
    {
      "egg_name": "string",
      "egg_comment": "string"
    }
  ]
}`,
    "Field meanings and rules:",
    "- my_egg_comment: one direct summary for the user, supportive and specific, based on today's signals.",
    "- egg_community_comment: list of community voices.",
    "- egg_name: name of the persona speaking (e.g., Focus Egg, Health Egg).",
    "- egg_comment: what that persona says; must be relevant, concise, and actionable.",
    "- Keep each comment short (1-2 sentences).",
    "- Do not include harmful, medical, legal, or financial claims.",
    "- If there is little signal, still provide gentle, neutral comments without fabricating details.",
    `Input JSON:\n${JSON.stringify(payload)}`,
  ].join("\n");
}

/**
 * One model item can yield up to four entries. An idea needs a title or
 * detail; the detail falls back to the title.
 */
export function itemToEntries(item: ExtractedItem): ExtractedEntry[] {
  const sourceEventIds = item.source_event_ids;
  const entries: ExtractedEntry[] = [];

  if (item.scrolling_idea_title || item.scrolling_idea_detail) {
    entries.push({
      kind: "idea",
      payload: {
        title: item.scrolling_idea_title || null,
        content: item.scrolling_idea_detail || item.scrolling_idea_title,
      },
      sourceEventIds,
    });
  }
  if (item.todo_item) {
    entries.push({ kind: "todo", payload: { title: item.todo_item }, sourceEventIds });
  }
  if (item.alert) {
    entries.push({ kind: "notification", payload: { title: item.alert, notifyAt: null }, sourceEventIds });
  }
  if (item.comment) {
    entries.push({ kind: "comment", payload: { content: item.comment, date: null }, sourceEventIds });
  }
  return entries;
}

function toExtractionError(error: unknown, context: string): ExtractionError {
  if (error instanceof ExtractionError) {
    return error;
  }
  const classified = classifyAiError(error);
  const status = classified.status === null ? "" : ` status=${classified.status}`;
  return new ExtractionError(
    `${context} failed${status}: ${describeError(error)}`,
    classified.kind,
    classified.retryAfterMs,
    { cause: error }
  );
}

export class EggbookExtractor implements Extractor {
  constructor(private readonly model: JsonModel) {}

  async extract(inputs: ExtractionInput[], mode: ExtractionMode, signal: AbortSignal): Promise<ExtractedEntry[]> {
    if (inputs.length === 0) {
      return [];
    }

    let body: unknown;
    try {
      body = await this.model.completeJson(buildItemsPrompt(inputs, mode), signal);
    } catch (error) {
      throw toExtractionError(error, `Extraction (${mode})`);
    }

    const parsed = extractionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExtractionError(
        `Extraction (${mode}) returned malformed output: ${parsed.error.issues[0]?.message ?? "invalid shape"}`,
        "permanent"
      );
    }

    return parsed.data.items.flatMap(itemToEntries);
  }
}

export class EggCommenter implements Commenter {
  constructor(private readonly model: JsonModel) {}

  async generate(signals: DaySignals, signal: AbortSignal): Promise<GeneratedComments> {
    let body: unknown;
    try {
      body = await this.model.completeJson(buildCommentsPrompt(signals), signal);
    } catch (error) {
      throw toExtractionError(error, "Comment generation");
    }

    const parsed = commentsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExtractionError("Comment generation returned malformed output", "permanent");
    }

    return {
      myEggComment: parsed.data.my_egg_comment,
      community: parsed.data.egg_community_comment
        .filter((item) => item.egg_comment.length > 0)
        .map((item) => ({ eggName: item.egg_name, eggComment: item.egg_comment })),
    };
  }
}
