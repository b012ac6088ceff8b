import { MemoryStore } from "../../__tests__/helpers/memory-store";
import type { TableEvent } from "../../poker/types";
import { HISTORY_PER_ROOM, HandHistoryService } from "../hand-history.service";

function ended(handId: string): Extract<TableEvent, { type: "HAND_ENDED" }> {
  return {
    type: "HAND_ENDED",
    handId,
    startedAt: 100,
    endedAt: 200,
    pot: 30,
    board: ["As", "Kd", "7c", "2h", "9s"],
    onlyOnePlayer: false,
    winners: [{ userId: "A", handle: "alice", amount: 30, bestHand: ["As", "Ad", "Kd", "9s", "7c"], description: "Pair" }],
    players: [
      { userId: "A", handle: "alice", committed: 15, folded: false },
      { userId: "B", handle: "bob", committed: 15, folded: false },
    ],
  };
}

describe("HandHistoryService", () => {
  it("stores finished hands newest first", async () => {
    const history = new HandHistoryService(new MemoryStore());

    await history.saveHand("room-1", ended("hand-1"));
    await history.saveHand("room-1", ended("hand-2"));

    const hands = await history.getRoomHistory("room-1");
    expect(hands.map((h) => h.handId)).toEqual(["hand-2", "hand-1"]);
    expect(hands[1]).toEqual({
      handId: "hand-1",
      roomId: "room-1",
      startedAt: 100,
      endedAt: 200,
      pot: 30,
      board: ["As", "Kd", "7c", "2h", "9s"],
      playersCount: 2,
      onlyOnePlayer: false,
      winners: [{ userId: "A", amount: 30, bestHand: ["As", "Ad", "Kd", "9s", "7c"], description: "Pair" }],
    });
    expect(await history.getRoomHistory("room-2")).toEqual([]);
  });

  it("skips entries that no longer parse", async () => {
    const store = new MemoryStore();
    const history = new HandHistoryService(store);

    await history.saveHand("room-1", ended("hand-1"));
    await store.lPush("history:room:room-1", "{not json", HISTORY_PER_ROOM);
    await store.lPush("history:room:room-1", JSON.stringify({ handId: 7 }), HISTORY_PER_ROOM);

    expect((await history.getRoomHistory("room-1")).map((h) => h.handId)).toEqual(["hand-1"]);
  });

  it("keeps a bounded number of hands per room", async () => {
    const history = new HandHistoryService(new MemoryStore());

    for (let i = 0; i < HISTORY_PER_ROOM + 5; i++) await history.saveHand("room-1", ended(`hand-${i}`));

    const hands = await history.getRoomHistory("room-1", 500);
    expect(hands).toHaveLength(HISTORY_PER_ROOM);
    expect(hands[0].handId).toBe(`hand-${HISTORY_PER_ROOM + 4}`);
  });
});
