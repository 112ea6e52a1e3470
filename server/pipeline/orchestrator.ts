/**
 * Pipeline Orchestrator
 *
 * Runs one user's drained work through
 *   pending -> transcribing -> (speech-to-text) -> extraction -> persistence
 * and leaves every event it touched in `processed` or `failed`.
 *
 * - Transcription failures are isolated per event; the rest of the batch proceeds.
 * - Extraction calls retry transient errors with exponential backoff and a
 *   per-attempt timeout.
 * - Entries are committed in groups of linked events: every entry lands in
 *   the same transaction as the `processed` transition of each event it
 *   references, so a failed event is never referenced by a stored entry.
 * - A client update during the run takes precedence; such an event keeps
 *   its `pending` status and is picked up by a later run.
 */

import type { EventRecord, EventStatus } from "@shared/schema";
import { withRetry, defaultSleep, type Sleep, type RetryConfig, type RetryNotice } from "../../lib/reliability";
import { log, logWarn, logError } from "../logger";
import { TranscriptionError, isTransientAiError, retryAfterHint, describeError } from "./errors";
import { needsTranscription, screenRecordingOf } from "./triggers";
import type {
  EventStore,
  EggbookStore,
  Transcriber,
  Extractor,
  ExtractionMode,
  ExtractionInput,
  ExtractedEntry,
  PipelineConfig,
} from "./types";

const SOURCE = "orchestrator";

export interface RunWork {
  singles: string[];
  batch: string[];
}

export interface RunReport {
  userId: string;
  processed: string[];
  failed: string[];
  skipped: string[];
  /** Events a client update took back to `pending` while the run held them. */
  requeued: string[];
  entriesWritten: number;
}

export interface EntryGroup {
  eventIds: string[];
  entries: ExtractedEntry[];
}

export interface OrchestratorDeps {
  events: EventStore;
  eggbook: EggbookStore;
  transcriber: Transcriber;
  extractor: Extractor;
  config: Pick<PipelineConfig, "maxEventAttempts" | "requestTimeoutMs" | "retryMaxAttempts" | "retryBaseDelayMs">;
  sleep?: Sleep;
  /** Called after a run that processed at least one event. Errors are logged, never rethrown. */
  afterRun?: (report: RunReport) => Promise<void>;
}

function byEventAt(a: EventRecord, b: EventRecord): number {
  return Date.parse(a.eventAt) - Date.parse(b.eventAt);
}

export function toExtractionInput(event: EventRecord): ExtractionInput {
  return {
    eventId: event.id,
    eventAt: event.eventAt,
    transcript: event.transcript,
    audioUrl: event.audioUrl,
    screenRecordingUrl: screenRecordingOf(event),
    durationSec: event.durationSec,
  };
}

/**
 * Keeps only source ids that belong to this call, in chronological order.
 * Entries the model did not tie to a known event belong to the whole call.
 */
export function attributeEntries(entries: ExtractedEntry[], events: EventRecord[]): ExtractedEntry[] {
  const order = new Map(events.map((event, index) => [event.id, index]));
  const allIds = events.map((event) => event.id);

  return entries.map((entry) => {
    const known = Array.from(new Set(entry.sourceEventIds.filter((id) => order.has(id))));
    known.sort((a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0));
    return { ...entry, sourceEventIds: known.length > 0 ? known : allIds };
  });
}

/**
 * Splits a call's output into groups that share no event. Entries that
 * reference a common event end up in the same group; an event without
 * entries forms a group of its own. Groups follow the order of `events`.
 */
export function groupByLinkedEvents(entries: ExtractedEntry[], events: EventRecord[]): EntryGroup[] {
  const parent = new Map(events.map((event) => [event.id, event.id]));
  const find = (id: string): string => {
    let root = id;
    for (let next = parent.get(root); next !== undefined && next !== root; next = parent.get(root)) {
      root = next;
    }
    return root;
  };

  for (const entry of entries) {
    const [first, ...rest] = entry.sourceEventIds;
    if (first === undefined) continue;
    for (const id of rest) {
      parent.set(find(id), find(first));
    }
  }

  const groups = new Map<string, EntryGroup>();
  for (const event of events) {
    const root = find(event.id);
    const group = groups.get(root);
    if (group) {
      group.eventIds.push(event.id);
    } else {
      groups.set(root, { eventIds: [event.id], entries: [] });
    }
  }
  for (const entry of entries) {
    const first = entry.sourceEventIds[0];
    if (first === undefined) continue;
    groups.get(find(first))?.entries.push(entry);
  }
  return Array.from(groups.values());
}

export class PipelineOrchestrator {
  private readonly sleep: Sleep;

  constructor(private readonly deps: OrchestratorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async run(userId: string, work: RunWork): Promise<RunReport> {
    const report: RunReport = { userId, processed: [], failed: [], skipped: [], requeued: [], entriesWritten: 0 };

    const singles = await this.loadRunnable(userId, work.singles, report);
    const singleIds = new Set(singles.map((event) => event.id));
    const batch = (await this.loadRunnable(
      userId,
      work.batch.filter((id) => !singleIds.has(id)),
      report
    )).sort(byEventAt);

    const touched = [...singles, ...batch];
    if (touched.length === 0) {
      return report;
    }

    log(`Run started for user ${userId}: ${singles.length} single, ${batch.length} batch`, SOURCE);
    const settled = new Set<string>();

    try {
      await this.deps.events.markRunStarted(touched.map((event) => event.id));

      for (const event of singles) {
        await this.processGroup(userId, [event], "single", settled, report);
      }
      if (batch.length > 0) {
        await this.processGroup(userId, batch, "batch", settled, report);
      }
    } catch (error) {
      logError(`Run for user ${userId} aborted`, SOURCE, error);
    } finally {
      for (const event of touched) {
        if (!settled.has(event.id)) {
          await this.settle(event.id, "failed", settled, report);
        }
      }
    }

    log(
      `Run finished for user ${userId}: ${report.processed.length} processed, ${report.failed.length} failed, ${report.entriesWritten} entries`,
      SOURCE
    );

    if (report.processed.length > 0 && this.deps.afterRun) {
      try {
        await this.deps.afterRun(report);
      } catch (error) {
        logError(`Post-run hook failed for user ${userId}`, SOURCE, error);
      }
    }

    return report;
  }

  /** Reloads events so a stale queue entry can never reprocess a finished event. */
  private async loadRunnable(userId: string, ids: string[], report: RunReport): Promise<EventRecord[]> {
    const loaded: EventRecord[] = [];
    for (const id of new Set(ids)) {
      const event = await this.deps.events.get(id);
      if (
        !event ||
        event.userId !== userId ||
        event.status === "processed" ||
        event.aiAttempts >= this.deps.config.maxEventAttempts
      ) {
        report.skipped.push(id);
        continue;
      }
      loaded.push(event);
    }
    return loaded;
  }

  private async processGroup(
    userId: string,
    events: EventRecord[],
    mode: ExtractionMode,
    settled: Set<string>,
    report: RunReport
  ): Promise<void> {
    const survivors: EventRecord[] = [];

    for (const event of events) {
      if (!needsTranscription(event)) {
        survivors.push(event);
        continue;
      }
      try {
        const transcript = await this.transcribe(event);
        const updated = await this.deps.events.update(event.id, { transcript });
        survivors.push(updated ?? { ...event, transcript });
      } catch (error) {
        logWarn(`Transcription failed for event ${event.id}: ${describeError(error)}`, SOURCE);
        await this.settle(event.id, "failed", settled, report);
      }
    }

    if (survivors.length === 0) {
      return;
    }

    let entries: ExtractedEntry[];
    try {
      entries = await this.extract(survivors, mode);
    } catch (error) {
      logWarn(
        `Extraction failed (${mode}) for events ${survivors.map((e) => e.id).join(", ")}: ${describeError(error)}`,
        SOURCE
      );
      for (const event of survivors) {
        await this.settle(event.id, "failed", settled, report);
      }
      return;
    }

    for (const group of groupByLinkedEvents(attributeEntries(entries, survivors), survivors)) {
      try {
        const { processed } = await this.deps.eggbook.commitEntries(userId, group.entries, group.eventIds);
        report.entriesWritten += group.entries.length;
        const moved = new Set(processed);
        for (const id of group.eventIds) {
          settled.add(id);
          if (moved.has(id)) {
            report.processed.push(id);
          } else {
            this.requeue(id, report);
          }
        }
      } catch (error) {
        logError(
          `Persisting ${group.entries.length} entries for events ${group.eventIds.join(", ")} failed`,
          SOURCE,
          error
        );
        for (const id of group.eventIds) {
          await this.settle(id, "failed", settled, report);
        }
      }
    }
  }

  private async transcribe(event: EventRecord): Promise<string> {
    const audioUrl = (event.audioUrl ?? "").trim();
    return withRetry(async ({ signal }) => {
      const text = (await this.deps.transcriber.transcribe(audioUrl, signal)).trim();
      if (!text) {
        throw new TranscriptionError(`Empty transcript for event ${event.id}`, "permanent");
      }
      return text;
    }, this.retryConfig(`transcription ${event.id}`));
  }

  private async extract(events: EventRecord[], mode: ExtractionMode): Promise<ExtractedEntry[]> {
    const inputs = events.map(toExtractionInput);
    return withRetry(
      ({ signal }) => this.deps.extractor.extract(inputs, mode, signal),
      this.retryConfig(`extraction (${mode}, ${inputs.length} events)`)
    );
  }

  private retryConfig(label: string): Partial<RetryConfig> {
    const { retryMaxAttempts, retryBaseDelayMs, requestTimeoutMs } = this.deps.config;
    return {
      maxAttempts: retryMaxAttempts,
      baseDelayMs: retryBaseDelayMs,
      maxDelayMs: Number.MAX_SAFE_INTEGER,
      jitterFactor: 0,
      attemptTimeoutMs: requestTimeoutMs,
      retryOn: isTransientAiError,
      retryAfterMs: retryAfterHint,
      sleep: this.sleep,
      onRetry: ({ attempt, maxAttempts, delayMs, error }: RetryNotice) => {
        logWarn(
          `Transient failure in ${label}, attempt=${attempt}/${maxAttempts}, sleeping ${delayMs}ms: ${describeError(error)}`,
          SOURCE
        );
      },
    };
  }

  private async settle(
    eventId: string,
    status: EventStatus,
    settled: Set<string>,
    report: RunReport
  ): Promise<void> {
    settled.add(eventId);
    try {
      if (!(await this.deps.events.settleStatus(eventId, status))) {
        this.requeue(eventId, report);
        return;
      }
    } catch (error) {
      logError(`Could not mark event ${eventId} ${status}`, SOURCE, error);
    }
    (status === "processed" ? report.processed : report.failed).push(eventId);
  }

  private requeue(eventId: string, report: RunReport): void {
    report.requeued.push(eventId);
    log(`Event ${eventId} changed during the run; left pending for the next run`, SOURCE);
  }
}
