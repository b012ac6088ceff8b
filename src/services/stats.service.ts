/**
 * Player stats: counters kept per user in the key-value store, updated
 * from table events.
 */

import { errorMessage, logger } from "../lib/logger";
import type { KeyValueStore } from "../lib/kv";
import { labelStrength } from "../poker/hand-labels";
import type { TableEventSink } from "../poker/rooms";
import type { PlayerAction, RoomId, TableEvent, UserId } from "../poker/types";

export type PlayerStats = {
  userId: UserId;
  handle: string;
  handsPlayed: number;
  handsWon: number;
  moneyEarned: number;
  folded: number;
  checked: number;
  called: number;
  raised: number;
  winStreak: number;
  bestStreak: number;
  bestHand: string | null;
  winRate: number;
};

type Counter = "handsPlayed" | "handsWon" | "moneyEarned" | "folded" | "checked" | "called" | "raised";

const ACTION_COUNTERS: Record<PlayerAction, Counter> = {
  FOLD: "folded",
  CHECK: "checked",
  CALL: "called",
  RAISE: "raised",
  ALL_IN: "raised",
};

const PLAYERS_KEY = "stats:players";
const statKey = (userId: UserId, field: string) => `stats:${userId}:${field}`;

export class StatsService implements TableEventSink {
  constructor(private readonly store: KeyValueStore) {}

  handle(roomId: RoomId, event: TableEvent): void {
    this.record(event).catch((err: unknown) => {
      logger.error("Failed to record stats", { roomId, event: event.type, error: errorMessage(err) });
    });
  }

  async record(event: TableEvent): Promise<void> {
    if (event.type === "PLAYER_ACTED") {
      await this.store.incrBy(statKey(event.userId, ACTION_COUNTERS[event.action]), 1);
      return;
    }
    if (event.type !== "HAND_ENDED") return;

    const winners = new Map(event.winners.map((w) => [w.userId, w]));
    for (const player of event.players) {
      await this.store.sAdd(PLAYERS_KEY, player.userId);
      await this.store.set(statKey(player.userId, "handle"), player.handle);
      await this.store.incrBy(statKey(player.userId, "handsPlayed"), 1);

      const won = winners.get(player.userId);
      // a refund of one's own uncalled chips is not a win
      if (!won || won.amount <= player.committed) {
        await this.store.set(statKey(player.userId, "winStreak"), "0");
        continue;
      }

      await this.store.incrBy(statKey(player.userId, "handsWon"), 1);
      await this.store.incrBy(statKey(player.userId, "moneyEarned"), won.amount - player.committed);
      const streak = await this.store.incrBy(statKey(player.userId, "winStreak"), 1);
      if (streak > (await this.readNumber(player.userId, "bestStreak"))) {
        await this.store.set(statKey(player.userId, "bestStreak"), String(streak));
      }

      const previous = await this.store.get(statKey(player.userId, "bestHand"));
      if (won.description && (previous === null || labelStrength(won.description) > labelStrength(previous))) {
        await this.store.set(statKey(player.userId, "bestHand"), won.description);
      }
    }
  }

  async getPlayerStats(userId: UserId): Promise<PlayerStats | null> {
    const handle = await this.store.get(statKey(userId, "handle"));
    if (handle === null) return null;

    const [handsPlayed, handsWon, moneyEarned, folded, checked, called, raised, winStreak, bestStreak] = await Promise.all(
      (["handsPlayed", "handsWon", "moneyEarned", "folded", "checked", "called", "raised", "winStreak", "bestStreak"] as const).map(
        (field) => this.readNumber(userId, field)
      )
    );

    return {
      userId,
      handle,
      handsPlayed,
      handsWon,
      moneyEarned,
      folded,
      checked,
      called,
      raised,
      winStreak,
      bestStreak,
      bestHand: await this.store.get(statKey(userId, "bestHand")),
      winRate: handsPlayed > 0 ? handsWon / handsPlayed : 0,
    };
  }

  /** Most hands won first, then best win rate. */
  async getLeaderboard(limit = 10): Promise<PlayerStats[]> {
    const userIds = await this.store.sMembers(PLAYERS_KEY);
    const all: PlayerStats[] = [];
    for (const userId of userIds) {
      const stats = await this.getPlayerStats(userId);
      if (stats) all.push(stats);
    }
    return all
      .sort((a, b) => b.handsWon - a.handsWon || b.winRate - a.winRate || a.userId.localeCompare(b.userId))
      .slice(0, limit);
  }

  private async readNumber(userId: UserId, field: string): Promise<number> {
    const raw = await this.store.get(statKey(userId, field));
    return raw === null ? 0 : Number(raw);
  }
}
