/**
 * Per-user event queues.
 *
 * EventQueue keeps each user's queued event ids ordered by event time.
 * BatchWindow adds the dual flush trigger (size threshold or max wait of the
 * oldest queued event). All operations are synchronous, so a drain is an
 * atomic read-and-clear on the event loop.
 */

export interface QueuedEvent {
  id: string;
  eventAt: string;
}

export type FlushReason = "count" | "max_wait";

export interface WindowStats {
  size: number;
  oldestEventAt: string | null;
  flushReason: FlushReason | null;
}

function byEventTime(a: QueuedEvent, b: QueuedEvent): number {
  return Date.parse(a.eventAt) - Date.parse(b.eventAt) || a.id.localeCompare(b.id);
}

export class EventQueue {
  private readonly byUser = new Map<string, Map<string, string>>();

  add(userId: string, event: QueuedEvent): void {
    let queue = this.byUser.get(userId);
    if (!queue) {
      queue = new Map();
      this.byUser.set(userId, queue);
    }
    queue.set(event.id, event.eventAt);
  }

  remove(userId: string, eventId: string): void {
    const queue = this.byUser.get(userId);
    if (!queue) return;
    queue.delete(eventId);
    if (queue.size === 0) {
      this.byUser.delete(userId);
    }
  }

  has(userId: string, eventId: string): boolean {
    return this.byUser.get(userId)?.has(eventId) ?? false;
  }

  size(userId: string): number {
    return this.byUser.get(userId)?.size ?? 0;
  }

  peek(userId: string): QueuedEvent[] {
    const queue = this.byUser.get(userId);
    if (!queue) return [];
    return Array.from(queue, ([id, eventAt]) => ({ id, eventAt })).sort(byEventTime);
  }

  oldestEventAt(userId: string): string | null {
    return this.peek(userId)[0]?.eventAt ?? null;
  }

  /** Removes and returns up to `max` events, oldest first. */
  drain(userId: string, max: number): QueuedEvent[] {
    const taken = this.peek(userId).slice(0, Math.max(0, max));
    for (const event of taken) {
      this.remove(userId, event.id);
    }
    return taken;
  }

  users(): string[] {
    return Array.from(this.byUser.keys());
  }
}

export class BatchWindow extends EventQueue {
  constructor(
    private readonly triggerCount: number,
    private readonly maxWaitMs: number
  ) {
    super();
  }

  flushReason(userId: string, now: number): FlushReason | null {
    const size = this.size(userId);
    if (size === 0) {
      return null;
    }
    if (size >= this.triggerCount) {
      return "count";
    }
    const oldest = this.oldestEventAt(userId);
    if (oldest !== null && now - Date.parse(oldest) >= this.maxWaitMs) {
      return "max_wait";
    }
    return null;
  }

  stats(userId: string, now: number): WindowStats {
    return {
      size: this.size(userId),
      oldestEventAt: this.oldestEventAt(userId),
      flushReason: this.flushReason(userId, now),
    };
  }
}
