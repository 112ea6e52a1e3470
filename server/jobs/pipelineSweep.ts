/**
 * Pipeline Sweep Job
 *
 * Periodically re-queues pending and failed events that no request will
 * touch again (cooldown deferrals, batch windows that aged out, retries)
 * and returns events stuck in `transcribing` after a crash to `pending`.
 */

import cron, { type ScheduledTask } from "node-cron";
import { log, logError } from "../logger";
import type { SweepReport } from "../pipeline/scheduler";

export interface SweepTarget {
  sweep(): Promise<SweepReport>;
  recoverStale(graceMs: number): Promise<number>;
}

export interface PipelineSweepOptions {
  cronExpression?: string;
  transcribingGraceMs: number;
}

export interface PipelineSweepResult {
  recovered: number;
  sweep: SweepReport;
}

let sweepTask: ScheduledTask | null = null;
let sweepInFlight = false;

/**
 * Run a single sweep pass.
 * Can be called manually or by the scheduled task.
 */
export async function runPipelineSweep(
  target: SweepTarget,
  transcribingGraceMs: number
): Promise<PipelineSweepResult> {
  const recovered = await target.recoverStale(transcribingGraceMs);
  const sweep = await target.sweep();
  return { recovered, sweep };
}

/**
 * Start the scheduled sweep. Default: every minute.
 */
export function startPipelineSweep(target: SweepTarget, options: PipelineSweepOptions): void {
  const cronExpression = options.cronExpression ?? "* * * * *";
  if (sweepTask) {
    log("Sweep job already running", "PipelineSweep");
    return;
  }

  log(`Starting scheduled sweep with expression: ${cronExpression}`, "PipelineSweep");

  const tick = async (): Promise<void> => {
    // A slow pass must not overlap the next tick
    if (sweepInFlight) return;
    sweepInFlight = true;
    try {
      await runPipelineSweep(target, options.transcribingGraceMs);
    } catch (error) {
      logError("Sweep failed", "PipelineSweep", error);
    } finally {
      sweepInFlight = false;
    }
  };

  sweepTask = cron.schedule(cronExpression, () => {
    void tick();
  });

  // Pick up whatever was left over from the previous process
  void tick();
}

/**
 * Stop the scheduled sweep job.
 */
export function stopPipelineSweep(): void {
  if (sweepTask) {
    sweepTask.stop();
    sweepTask = null;
    log("Sweep job stopped", "PipelineSweep");
  }
}

export function isPipelineSweepRunning(): boolean {
  return sweepTask !== null;
}
