import { errorMessage, logger } from "../lib/logger";
import type { TableEventSink } from "./rooms";
import type { RoomId, TableEvent, UserId } from "./types";

export interface TurnForcer {
  forceFold(roomId: RoomId, userId?: UserId): Promise<boolean>;
}

/**
 * One pending timeout per room, keyed by the turn it was scheduled for.
 * When it fires the actor is force-folded; the engine re-checks the clock.
 */
export class TurnTimer implements TableEventSink {
  private readonly timers = new Map<RoomId, { key: string; timeout: NodeJS.Timeout }>();

  constructor(
    private readonly forcer: TurnForcer,
    private readonly now: () => number = Date.now
  ) {}

  handle(roomId: RoomId, event: TableEvent): void {
    if (event.type === "TURN") {
      this.schedule(roomId, `${event.handId}:${event.userId}:${event.endsAt}`, event.userId, event.endsAt);
    } else if (event.type === "HAND_ENDED" || event.type === "HAND_ABORTED") {
      this.clear(roomId);
    }
  }

  pending(roomId: RoomId): boolean {
    return this.timers.has(roomId);
  }

  clear(roomId: RoomId) {
    const existing = this.timers.get(roomId);
    if (!existing) return;
    clearTimeout(existing.timeout);
    this.timers.delete(roomId);
  }

  stopAll() {
    for (const roomId of Array.from(this.timers.keys())) this.clear(roomId);
  }

  private schedule(roomId: RoomId, key: string, userId: UserId, endsAt: number) {
    const existing = this.timers.get(roomId);
    if (existing && existing.key === key) return;
    this.clear(roomId);

    const delay = Math.max(0, endsAt - this.now());
    const timeout = setTimeout(() => {
      if (this.timers.get(roomId)?.key === key) this.timers.delete(roomId);
      this.forcer.forceFold(roomId, userId).catch((err: unknown) => {
        logger.error("Turn timeout fold failed", { roomId, userId, error: errorMessage(err) });
      });
    }, delay);
    timeout.unref();

    this.timers.set(roomId, { key, timeout });
  }
}
