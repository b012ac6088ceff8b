import type { TableEventSink } from "../poker/rooms";
import type { RoomId, TableEvent } from "../poker/types";
import type { GameServer } from "./socket";

export const roomChannel = (roomId: RoomId) => `room:${roomId}`;
export const userChannel = (userId: string) => `user:${userId}`;

/** Hole cards go to their owner only; everything else to the whole room. */
export class SocketNotifier implements TableEventSink {
  constructor(private readonly io: GameServer) {}

  handle(roomId: RoomId, event: TableEvent): void {
    if (event.type === "PRIVATE_CARDS") {
      this.io.to(userChannel(event.userId)).emit("room:private_cards", {
        roomId,
        handId: event.handId,
        cards: event.cards,
      });
      return;
    }
    this.io.to(roomChannel(roomId)).emit("room:event", { roomId, ...event });
  }
}
