/**
 * Hand history service.
 * Keeps the most recent finished hands of each room for audit and dispute resolution.
 */

import { z } from "zod";
import { errorMessage, logger } from "../lib/logger";
import type { KeyValueStore } from "../lib/kv";
import type { TableEventSink } from "../poker/rooms";
import type { RoomId, TableEvent } from "../poker/types";

export const HISTORY_PER_ROOM = 50;

const handRecordSchema = z.object({
  handId: z.string(),
  roomId: z.string(),
  startedAt: z.number(),
  endedAt: z.number(),
  pot: z.number(),
  board: z.array(z.string()),
  playersCount: z.number().int(),
  onlyOnePlayer: z.boolean(),
  winners: z.array(
    z.object({
      userId: z.string(),
      amount: z.number(),
      bestHand: z.array(z.string()),
      description: z.string().nullable(),
    })
  ),
});

export type HandRecord = z.infer<typeof handRecordSchema>;

const historyKey = (roomId: RoomId) => `history:room:${roomId}`;

export class HandHistoryService implements TableEventSink {
  constructor(private readonly store: KeyValueStore) {}

  handle(roomId: RoomId, event: TableEvent): void {
    if (event.type !== "HAND_ENDED") return;
    this.saveHand(roomId, event).catch((err: unknown) => {
      logger.error("Failed to save hand history", { roomId, handId: event.handId, error: errorMessage(err) });
    });
  }

  async saveHand(roomId: RoomId, event: Extract<TableEvent, { type: "HAND_ENDED" }>): Promise<void> {
    const record: HandRecord = {
      handId: event.handId,
      roomId,
      startedAt: event.startedAt,
      endedAt: event.endedAt,
      pot: event.pot,
      board: event.board,
      playersCount: event.players.length,
      onlyOnePlayer: event.onlyOnePlayer,
      winners: event.winners.map((w) => ({
        userId: w.userId,
        amount: w.amount,
        bestHand: w.bestHand,
        description: w.description,
      })),
    };
    await this.store.lPush(historyKey(roomId), JSON.stringify(record), HISTORY_PER_ROOM);
  }

  /** Newest first. Entries that no longer parse are skipped. */
  async getRoomHistory(roomId: RoomId, limit = 10): Promise<HandRecord[]> {
    const raw = await this.store.lRange(historyKey(roomId), Math.min(limit, HISTORY_PER_ROOM));
    const records: HandRecord[] = [];
    for (const entry of raw) {
      let json: unknown;
      try {
        json = JSON.parse(entry);
      } catch (err) {
        logger.warn("Unreadable hand history entry", { roomId, error: errorMessage(err) });
        continue;
      }
      const parsed = handRecordSchema.safeParse(json);
      if (parsed.success) records.push(parsed.data);
      else logger.warn("Invalid hand history entry", { roomId, issues: parsed.error.issues.length });
    }
    return records;
  }
}
