/**
 * Pipeline contracts
 *
 * The stores and AI adapters the pipeline consumes. Production
 * implementations live in server/storage.ts, server/stt and server/services;
 * tests substitute in-memory versions.
 */

import type {
  EventRecord,
  EventFields,
  EventStatus,
  InsertEvent,
  EggbookIdea,
  EggbookTodo,
  EggbookNotification,
  EggbookCommentGeneration,
} from "@shared/schema";

export interface PipelineConfig {
  cooldownMs: number;
  batchTriggerCount: number;
  batchMaxWaitMs: number;
  maxEventsPerRun: number;
  maxEventAttempts: number;
  requestTimeoutMs: number;
  retryMaxAttempts: number;
  retryBaseDelayMs: number;
  transcribingGraceMs: number;
  dailyCommentMinActiveSec: number;
  commentRetentionDays: number;
}

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

// ============================================
// EVENT STORE
// ============================================

export interface EventStore {
  create(event: InsertEvent): Promise<EventRecord>;
  update(id: string, fields: EventFields): Promise<EventRecord | undefined>;
  get(id: string): Promise<EventRecord | undefined>;
  /**
   * Moves an event out of `transcribing`. Returns false, leaving the row
   * untouched, when a client update already took the event back.
   */
  settleStatus(id: string, status: EventStatus): Promise<boolean>;
  /** Moves the events to `transcribing` and counts the run against each. */
  markRunStarted(ids: string[]): Promise<void>;
  /** Unprocessed events without a recording reference that carry a transcript or audio, oldest first. */
  listPendingBatchable(userId: string, maxAttempts: number): Promise<EventRecord[]>;
  /** Unprocessed events with a screen recording reference, oldest first. */
  listPendingSingles(userId: string, maxAttempts: number): Promise<EventRecord[]>;
  listUsersWithPendingWork(maxAttempts: number): Promise<string[]>;
  listStaleTranscribing(updatedBefore: string): Promise<EventRecord[]>;
  listForDay(userId: string, startIso: string, endIso: string): Promise<EventRecord[]>;
}

// ============================================
// EGGBOOK STORE
// ============================================

export interface IdeaPayload {
  title: string | null;
  content: string;
}

export interface TodoPayload {
  title: string;
}

export interface NotificationPayload {
  title: string;
  notifyAt: string | null;
}

export interface CommentPayload {
  content: string;
  date: string | null;
}

export type ExtractedEntry =
  | { kind: "idea"; payload: IdeaPayload; sourceEventIds: string[] }
  | { kind: "todo"; payload: TodoPayload; sourceEventIds: string[] }
  | { kind: "notification"; payload: NotificationPayload; sourceEventIds: string[] }
  | { kind: "comment"; payload: CommentPayload; sourceEventIds: string[] };

export type EggbookEntryKind = ExtractedEntry["kind"];

export interface CommitResult {
  entryIds: string[];
  /** Events moved from `transcribing` to `processed` by the commit. */
  processed: string[];
}

export interface EggbookStore {
  insert(userId: string, entry: ExtractedEntry): Promise<string>;
  /** Writes every entry or none of them. */
  insertMany(userId: string, entries: ExtractedEntry[]): Promise<string[]>;
  /**
   * Writes the entries and marks the events `processed` in one transaction.
   * Events no longer in `transcribing` keep their status.
   */
  commitEntries(userId: string, entries: ExtractedEntry[], eventIds: string[]): Promise<CommitResult>;
}

// ============================================
// AI ADAPTERS
// ============================================

export interface Transcriber {
  transcribe(audioUrl: string, signal: AbortSignal): Promise<string>;
}

export type ExtractionMode = "single" | "batch";

export interface ExtractionInput {
  eventId: string;
  eventAt: string;
  transcript: string | null;
  audioUrl: string | null;
  screenRecordingUrl: string | null;
  durationSec: number;
}

export interface Extractor {
  extract(inputs: ExtractionInput[], mode: ExtractionMode, signal: AbortSignal): Promise<ExtractedEntry[]>;
}

// ============================================
// DAILY COMMENTS
// ============================================

export interface DaySignals {
  ideas: EggbookIdea[];
  todos: EggbookTodo[];
  notifications: EggbookNotification[];
}

export interface NewComment {
  content: string;
  date: string;
  isCommunity: boolean;
  eggName: string | null;
  eggComment: string | null;
}

export type CommentGenerationFields = Partial<Pick<EggbookCommentGeneration,
  "status" | "triggerMode" | "hasInput" | "activeDurationSec" | "errorMessage"
>>;

export interface CommentStore {
  getOrCreateGenerationState(userId: string, date: string): Promise<EggbookCommentGeneration>;
  updateGenerationState(id: string, fields: CommentGenerationFields): Promise<EggbookCommentGeneration>;
  listSignalsForDay(userId: string, startIso: string, endIso: string): Promise<DaySignals>;
  /** Returns false when an identical comment already exists. */
  upsertComment(userId: string, comment: NewComment): Promise<boolean>;
  /** Creates the notification unless one with the same title exists. */
  ensureNotification(userId: string, title: string, notifyAt: string): Promise<boolean>;
  deleteCommentDataBefore(userId: string, date: string): Promise<void>;
}

export interface CommunityComment {
  eggName: string;
  eggComment: string;
}

export interface GeneratedComments {
  myEggComment: string;
  community: CommunityComment[];
}

export interface Commenter {
  generate(signals: DaySignals, signal: AbortSignal): Promise<GeneratedComments>;
}
