import { MemoryStore } from "../../__tests__/helpers/memory-store";
import type { TableEvent } from "../../poker/types";
import { StatsService } from "../stats.service";

function handEnded(winner: { userId: string; amount: number; description: string | null }, committed: number): TableEvent {
  return {
    type: "HAND_ENDED",
    handId: "hand-1",
    startedAt: 0,
    endedAt: 10,
    pot: committed * 2,
    board: [],
    onlyOnePlayer: false,
    winners: [{ ...winner, handle: winner.userId, bestHand: [] }],
    players: [
      { userId: "A", handle: "alice", committed, folded: false },
      { userId: "B", handle: "bob", committed, folded: false },
    ],
  };
}

function acted(userId: string, action: "FOLD" | "CHECK" | "CALL" | "RAISE" | "ALL_IN"): TableEvent {
  return { type: "PLAYER_ACTED", handId: "hand-1", userId, action, amount: 0, timeout: false };
}

describe("StatsService", () => {
  it("counts actions, wins and streaks", async () => {
    const stats = new StatsService(new MemoryStore());

    await stats.record(acted("A", "RAISE"));
    await stats.record(acted("A", "ALL_IN"));
    await stats.record(acted("B", "CALL"));
    await stats.record(handEnded({ userId: "A", amount: 50, description: "Pair" }, 25));
    await stats.record(handEnded({ userId: "A", amount: 40, description: "Flush" }, 20));
    await stats.record(handEnded({ userId: "B", amount: 30, description: "Two Pair" }, 15));

    expect(await stats.getPlayerStats("A")).toEqual({
      userId: "A",
      handle: "alice",
      handsPlayed: 3,
      handsWon: 2,
      moneyEarned: 45,
      folded: 0,
      checked: 0,
      called: 0,
      raised: 2,
      winStreak: 0,
      bestStreak: 2,
      bestHand: "Flush",
      winRate: 2 / 3,
    });
    expect(await stats.getPlayerStats("B")).toMatchObject({ handsWon: 1, called: 1, winStreak: 1, bestHand: "Two Pair" });
  });

  it("does not count a refund of one's own chips as a win", async () => {
    const stats = new StatsService(new MemoryStore());

    await stats.record(handEnded({ userId: "A", amount: 25, description: null }, 25));

    expect(await stats.getPlayerStats("A")).toMatchObject({ handsPlayed: 1, handsWon: 0, moneyEarned: 0 });
  });

  it("returns null for players it has never seen", async () => {
    const stats = new StatsService(new MemoryStore());
    await expect(stats.getPlayerStats("nobody")).resolves.toBeNull();
  });

  it("ranks the leaderboard by hands won", async () => {
    const stats = new StatsService(new MemoryStore());

    await stats.record(handEnded({ userId: "B", amount: 20, description: null }, 10));
    await stats.record(handEnded({ userId: "B", amount: 20, description: null }, 10));
    await stats.record(handEnded({ userId: "A", amount: 20, description: null }, 10));

    const board = await stats.getLeaderboard();
    expect(board.map((s) => [s.userId, s.handsWon])).toEqual([
      ["B", 2],
      ["A", 1],
    ]);
    expect(await stats.getLeaderboard(1)).toHaveLength(1);
  });
});
