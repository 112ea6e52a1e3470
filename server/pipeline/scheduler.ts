/**
 * Aggregation Scheduler
 *
 * Decides, for every created or updated event, whether it goes to single
 * inference or accumulates in the user's batch window, and starts a run when
 * the Cooldown Gate allows one. Runs are detached from the caller; a denied
 * or lost trigger is picked up again by sweep().
 */

import type { EventRecord } from "@shared/schema";
import { log, logDebug, logError } from "../logger";
import { BatchWindow, EventQueue, type WindowStats } from "./batchWindow";
import { CooldownGate, type GateState } from "./cooldownGate";
import { classifyEvent, type InferencePath } from "./triggers";
import type { RunReport, RunWork } from "./orchestrator";
import type { Clock, EventStore, PipelineConfig } from "./types";

const SOURCE = "scheduler";

export type DecisionAction = "ignored" | "queued" | "started" | "deferred";

export interface Decision {
  path: InferencePath;
  action: DecisionAction;
}

export interface RunStarter {
  run(userId: string, work: RunWork): Promise<RunReport>;
}

export interface SchedulerDeps {
  events: EventStore;
  orchestrator: RunStarter;
  gate: CooldownGate;
  window: BatchWindow;
  singles: EventQueue;
  clock: Clock;
  config: Pick<PipelineConfig, "maxEventsPerRun" | "maxEventAttempts">;
}

export interface SweepReport {
  users: number;
  started: number;
  deferred: number;
}

export interface SchedulerDebugState {
  gate: GateState;
  batchWindow: WindowStats;
  singleQueueSize: number;
  inBatchWindow: boolean;
  inSingleQueue: boolean;
}

export class AggregationScheduler {
  private readonly running = new Set<Promise<void>>();

  constructor(private readonly deps: SchedulerDeps) {}

  onEventChanged(event: EventRecord): Decision {
    const { window, singles, config } = this.deps;
    const { path } = classifyEvent(event, config.maxEventAttempts);

    if (path === "none") {
      singles.remove(event.userId, event.id);
      window.remove(event.userId, event.id);
      return { path, action: "ignored" };
    }

    const queued = { id: event.id, eventAt: event.eventAt };
    if (path === "single") {
      window.remove(event.userId, event.id);
      singles.add(event.userId, queued);
    } else {
      singles.remove(event.userId, event.id);
      window.add(event.userId, queued);
    }

    if (!this.hasReadyWork(event.userId)) {
      logDebug(`Event ${event.id} queued for batch (${window.size(event.userId)} waiting)`, SOURCE);
      return { path, action: "queued" };
    }

    return { path, action: this.tryRun(event.userId) ? "started" : "deferred" };
  }

  /**
   * Starts a run for the user if there is ready work and the gate allows it.
   * Returns false when nothing was started.
   */
  tryRun(userId: string): boolean {
    const { gate } = this.deps;
    if (!this.hasReadyWork(userId)) {
      return false;
    }
    if (!gate.tryAcquire(userId)) {
      logDebug(`Run deferred for user ${userId} (cooldown or in flight)`, SOURCE);
      return false;
    }

    const work = this.drain(userId);
    this.launch(userId, work);
    return true;
  }

  /** Resolves once every run started so far (and any they chain) has settled. */
  async whenIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.allSettled(Array.from(this.running));
    }
  }

  /**
   * Rehydrates queues from the store and retries every user with pending
   * work. Covers cooldown denials and triggers lost to a restart.
   */
  async sweep(): Promise<SweepReport> {
    const { events, gate, window, singles, config } = this.deps;
    const report: SweepReport = { users: 0, started: 0, deferred: 0 };
    const userIds = await events.listUsersWithPendingWork(config.maxEventAttempts);

    for (const userId of userIds) {
      if (gate.isProcessing(userId)) {
        continue;
      }
      report.users++;

      for (const event of await events.listPendingSingles(userId, config.maxEventAttempts)) {
        window.remove(userId, event.id);
        singles.add(userId, { id: event.id, eventAt: event.eventAt });
      }
      for (const event of await events.listPendingBatchable(userId, config.maxEventAttempts)) {
        if (!singles.has(userId, event.id)) {
          window.add(userId, { id: event.id, eventAt: event.eventAt });
        }
      }

      if (!this.hasReadyWork(userId)) {
        continue;
      }
      if (this.tryRun(userId)) {
        report.started++;
      } else {
        report.deferred++;
      }
    }

    if (report.started > 0 || report.deferred > 0) {
      log(`Sweep: ${report.users} users, ${report.started} runs started, ${report.deferred} deferred`, SOURCE);
    }
    return report;
  }

  /**
   * Resets events stuck in `transcribing` (a run that died with the process)
   * back to `pending`. Users with a run in flight are left alone.
   */
  async recoverStale(graceMs: number): Promise<number> {
    const { events, gate, clock } = this.deps;
    const cutoff = new Date(clock.now() - graceMs).toISOString();
    const stale = await events.listStaleTranscribing(cutoff);

    let reset = 0;
    for (const event of stale) {
      if (gate.isProcessing(event.userId)) {
        continue;
      }
      if (await events.settleStatus(event.id, "pending")) {
        reset++;
      }
    }

    if (reset > 0) {
      log(`Recovered ${reset} stale transcribing events`, SOURCE);
    }
    return reset;
  }

  getDebugState(userId: string, eventId: string): SchedulerDebugState {
    const { gate, window, singles, clock } = this.deps;
    return {
      gate: gate.getState(userId),
      batchWindow: window.stats(userId, clock.now()),
      singleQueueSize: singles.size(userId),
      inBatchWindow: window.has(userId, eventId),
      inSingleQueue: singles.has(userId, eventId),
    };
  }

  private hasReadyWork(userId: string): boolean {
    const { window, singles, clock } = this.deps;
    return singles.size(userId) > 0 || window.flushReason(userId, clock.now()) !== null;
  }

  /** Singles first, then the batch window if it is due, up to the per-run cap. */
  private drain(userId: string): RunWork {
    const { window, singles, clock, config } = this.deps;
    const singleIds = singles.drain(userId, config.maxEventsPerRun).map((event) => event.id);

    let batchIds: string[] = [];
    const remaining = config.maxEventsPerRun - singleIds.length;
    const reason = window.flushReason(userId, clock.now());
    if (remaining > 0 && reason !== null) {
      batchIds = window.drain(userId, remaining).map((event) => event.id);
      log(`Flushing ${batchIds.length} batch events for user ${userId} (${reason})`, SOURCE);
    }

    return { singles: singleIds, batch: batchIds };
  }

  private launch(userId: string, work: RunWork): void {
    const { orchestrator, gate } = this.deps;
    const run: Promise<void> = orchestrator
      .run(userId, work)
      .then((report) => {
        logDebug(`Run report for user ${userId}`, SOURCE, {
          processed: report.processed.length,
          failed: report.failed.length,
          skipped: report.skipped.length,
          requeued: report.requeued.length,
        });
      })
      .catch((error: unknown) => {
        logError(`Run crashed for user ${userId}`, SOURCE, error);
      })
      .finally(() => {
        gate.release(userId);
        this.running.delete(run);
      });
    this.running.add(run);
  }
}
