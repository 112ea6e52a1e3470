/**
 * Daily comment generation
 *
 * Once a day's activity crosses the threshold, asks the model for a personal
 * comment plus a few community persona comments on the day's ideas, todos
 * and notifications. Per (user, date) state moves idle -> generating ->
 * ready | failed. Manual triggers skip the activity threshold.
 */

import type { EggbookCommentGeneration } from "@shared/schema";
import { withTimeout } from "../../lib/reliability";
import { log, logError } from "../logger";
import { describeError } from "./errors";
import { hasMedia } from "./triggers";
import type { Clock, CommentStore, Commenter, EventStore, PipelineConfig } from "./types";

const SOURCE = "comments";
const DAY_MS = 24 * 60 * 60 * 1000;

export interface CommentGenerationView {
  date: string;
  status: EggbookCommentGeneration["status"];
  hasInput: boolean;
  activeDurationSec: number;
  canManualTrigger: boolean;
  errorMessage: string | null;
}

export interface DailyCommentDeps {
  comments: CommentStore;
  events: EventStore;
  /** Null when AI is disabled. */
  commenter: Commenter | null;
  clock: Clock;
  config: Pick<PipelineConfig, "dailyCommentMinActiveSec" | "commentRetentionDays" | "requestTimeoutMs">;
}

export function isoDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function addDays(date: string, days: number): string {
  return isoDate(Date.parse(`${date}T00:00:00.000Z`) + days * DAY_MS);
}

export function dayBounds(date: string): { start: string; end: string } {
  const start = Date.parse(`${date}T00:00:00.000Z`);
  return {
    start: new Date(start).toISOString(),
    end: new Date(start + DAY_MS).toISOString(),
  };
}

export function commentReadyTitle(date: string): string {
  return `Comments ready for ${date}`;
}

function toView(state: EggbookCommentGeneration): CommentGenerationView {
  return {
    date: state.date,
    status: state.status,
    hasInput: state.hasInput,
    activeDurationSec: Math.trunc(state.activeDurationSec),
    canManualTrigger: state.hasInput,
    errorMessage: state.errorMessage,
  };
}

export class DailyCommentService {
  constructor(private readonly deps: DailyCommentDeps) {}

  today(): string {
    return isoDate(this.deps.clock.now());
  }

  async getState(userId: string, date: string): Promise<CommentGenerationView> {
    const { comments } = this.deps;
    await this.cleanup(userId);

    const state = await comments.getOrCreateGenerationState(userId, date);
    const { hasInput, activeDurationSec } = await this.inputStats(userId, date);
    const resetToIdle = !hasInput && (state.status === "idle" || state.status === "ready");

    const updated = await comments.updateGenerationState(state.id, {
      hasInput,
      activeDurationSec,
      ...(resetToIdle ? { status: "idle" as const } : {}),
    });
    return toView(updated);
  }

  async trigger(userId: string, date: string, options: { manual: boolean }): Promise<CommentGenerationView> {
    const { comments, commenter, config } = this.deps;
    await this.cleanup(userId);

    const state = await comments.getOrCreateGenerationState(userId, date);
    const { hasInput, activeDurationSec } = await this.inputStats(userId, date);
    const triggerMode = options.manual ? "manual" : "auto";
    const base = { hasInput, activeDurationSec, triggerMode } as const;

    if (!hasInput) {
      await comments.updateGenerationState(state.id, {
        ...base,
        status: "idle",
        errorMessage: "No voice/screen input for the day",
      });
      return this.getState(userId, date);
    }

    if (!options.manual && activeDurationSec < config.dailyCommentMinActiveSec) {
      await comments.updateGenerationState(state.id, {
        ...base,
        status: "idle",
        errorMessage: `Active duration below auto threshold (${config.dailyCommentMinActiveSec}s)`,
      });
      return this.getState(userId, date);
    }

    if (!commenter) {
      await comments.updateGenerationState(state.id, {
        ...base,
        status: "failed",
        errorMessage: "AI is not configured",
      });
      return this.getState(userId, date);
    }

    await comments.updateGenerationState(state.id, { ...base, status: "generating", errorMessage: null });

    const { start, end } = dayBounds(date);
    try {
      const signals = await comments.listSignalsForDay(userId, start, end);
      if (signals.ideas.length === 0 && signals.todos.length === 0 && signals.notifications.length === 0) {
        await comments.updateGenerationState(state.id, {
          status: "idle",
          errorMessage: "No idea/todo/alert signals for the day",
        });
        return this.getState(userId, date);
      }

      const generated = await withTimeout(
        (signal) => commenter.generate(signals, signal),
        config.requestTimeoutMs
      );

      await comments.upsertComment(userId, {
        content: generated.myEggComment,
        date,
        isCommunity: false,
        eggName: null,
        eggComment: null,
      });
      for (const item of generated.community) {
        await comments.upsertComment(userId, {
          content: item.eggName ? `${item.eggName}: ${item.eggComment}` : item.eggComment,
          date,
          isCommunity: true,
          eggName: item.eggName,
          eggComment: item.eggComment,
        });
      }

      await comments.updateGenerationState(state.id, { status: "ready", errorMessage: null });
      await comments.ensureNotification(userId, commentReadyTitle(date), new Date(this.deps.clock.now()).toISOString());
      log(`Comments ready for user ${userId} on ${date} (${triggerMode})`, SOURCE);
    } catch (error) {
      logError(`Comment generation failed for user ${userId} on ${date}`, SOURCE, error);
      await comments.updateGenerationState(state.id, {
        status: "failed",
        errorMessage: describeError(error).slice(0, 500),
      });
    }

    return this.getState(userId, date);
  }

  private async inputStats(userId: string, date: string): Promise<{ hasInput: boolean; activeDurationSec: number }> {
    const { start, end } = dayBounds(date);
    const dayEvents = await this.deps.events.listForDay(userId, start, end);
    return {
      hasInput: dayEvents.some(hasMedia),
      activeDurationSec: dayEvents.reduce((sum, event) => sum + (event.durationSec || 0), 0),
    };
  }

  private async cleanup(userId: string): Promise<void> {
    const cutoff = addDays(this.today(), -(this.deps.config.commentRetentionDays - 1));
    await this.deps.comments.deleteCommentDataBefore(userId, cutoff);
  }
}
