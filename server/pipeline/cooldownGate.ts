/**
 * Per-User Cooldown Gate
 *
 * Serializes AI work per user and spaces runs at least `cooldownMs` apart.
 * The cooldown counts from the last *attempted* run, so a run that fails
 * still holds the user back for the full window.
 *
 * tryAcquire is a synchronous test-and-set: two callers for the same user
 * can never both observe the slot as free.
 */

import type { Clock } from "./types";

export interface GateState {
  processing: boolean;
  lastRunAt: string | null;
  cooldownRemainingSec: number;
}

export class CooldownGate {
  private readonly inFlight = new Set<string>();
  private readonly lastRunAt = new Map<string, number>();

  constructor(
    private readonly cooldownMs: number,
    private readonly clock: Clock
  ) {}

  tryAcquire(userId: string): boolean {
    if (this.inFlight.has(userId)) {
      return false;
    }
    const now = this.clock.now();
    const last = this.lastRunAt.get(userId);
    if (last !== undefined && now - last < this.cooldownMs) {
      return false;
    }
    this.inFlight.add(userId);
    this.lastRunAt.set(userId, now);
    return true;
  }

  release(userId: string): void {
    this.inFlight.delete(userId);
  }

  isProcessing(userId: string): boolean {
    return this.inFlight.has(userId);
  }

  cooldownRemainingMs(userId: string): number {
    const last = this.lastRunAt.get(userId);
    if (last === undefined) {
      return 0;
    }
    return Math.max(0, this.cooldownMs - (this.clock.now() - last));
  }

  getState(userId: string): GateState {
    const last = this.lastRunAt.get(userId);
    return {
      processing: this.inFlight.has(userId),
      lastRunAt: last === undefined ? null : new Date(last).toISOString(),
      cooldownRemainingSec: Math.round(this.cooldownRemainingMs(userId) / 100) / 10,
    };
  }
}
