import { z, ZodError } from "zod";
import type { JwtUser } from "../auth";
import { errorMessage, logger } from "../lib/logger";
import { cardCode } from "../poker/cards";
import { PokerError } from "../poker/errors";
import type { RoomRegistry } from "../poker/rooms";
import type { StatsService } from "../services/stats.service";
import type { WalletLedger } from "../services/wallet.service";
import { roomChannel } from "./notifier";
import type { ActionAck, ErrorEvent, GameServer, GameSocket } from "./socket";

export type RoomGatewayDeps = {
  registry: RoomRegistry;
  ledger: WalletLedger;
  stats: StatsService;
};

const roomSchema = z.object({ roomId: z.string().min(1).max(128) });

const actionSchema = roomSchema.extend({
  action: z.enum(["FOLD", "CHECK", "CALL", "RAISE", "ALL_IN"]),
  amount: z.number().int().positive().optional(),
});

export function toErrorEvent(err: unknown): ErrorEvent {
  if (err instanceof PokerError) return { type: "ERROR", code: err.code, message: err.message };
  if (err instanceof ZodError) return { type: "ERROR", code: "INVALID_PAYLOAD", message: "Invalid payload" };
  return { type: "ERROR", code: "INTERNAL", message: "Something went wrong" };
}

export function registerRoomGateway(io: GameServer, socket: GameSocket, user: JwtUser, deps: RoomGatewayDeps) {
  const { registry, ledger, stats } = deps;

  const guarded =
    <A extends unknown[]>(name: string, handler: (...args: A) => Promise<void>) =>
    (...args: A) => {
      handler(...args).catch((err: unknown) => {
        if (!(err instanceof PokerError) && !(err instanceof ZodError)) {
          logger.error("Socket handler failed", { event: name, userId: user.userId, error: errorMessage(err) });
        }
        socket.emit("room:event", toErrorEvent(err));
      });
    };

  const sendState = async (roomId: string) => {
    socket.emit("room:state", { roomId, ...(await registry.snapshot(roomId)) });
  };

  socket.on(
    "room:join",
    guarded("room:join", async (payload: unknown) => {
      const { roomId } = roomSchema.parse(payload);
      await socket.join(roomChannel(roomId));
      await sendState(roomId);
    })
  );

  socket.on(
    "room:ready",
    guarded("room:ready", async (payload: unknown) => {
      const { roomId } = roomSchema.parse(payload);
      await socket.join(roomChannel(roomId));
      const members = await io.in(roomChannel(roomId)).fetchSockets();
      await registry.seat(roomId, user.userId, user.username, members.length);
    })
  );

  socket.on(
    "room:start",
    guarded("room:start", async (payload: unknown) => {
      const { roomId } = roomSchema.parse(payload);
      await registry.start(roomId);
    })
  );

  socket.on(
    "room:action",
    guarded("room:action", async (payload: unknown, ack?: ActionAck) => {
      const { roomId, action, amount } = actionSchema.parse(payload);
      const ok = await registry.act(roomId, user.userId, action, amount);
      ack?.({ ok });
    })
  );

  socket.on(
    "room:cards",
    guarded("room:cards", async (payload: unknown) => {
      const { roomId } = roomSchema.parse(payload);
      const cards = await registry.privateCards(roomId, user.userId);
      if (!cards) return;
      const { handId } = await registry.snapshot(roomId);
      socket.emit("room:private_cards", { roomId, handId, cards: cards.map(cardCode) });
    })
  );

  socket.on(
    "room:ban",
    guarded("room:ban", async (payload: unknown) => {
      const { roomId } = roomSchema.parse(payload);
      await registry.forceFold(roomId);
    })
  );

  socket.on(
    "wallet:balance",
    guarded("wallet:balance", async () => {
      socket.emit("wallet:balance", { balance: await ledger.value(user.userId) });
    })
  );

  socket.on(
    "wallet:bonus",
    guarded("wallet:bonus", async () => {
      socket.emit("wallet:bonus", await ledger.claimDailyBonus(user.userId));
    })
  );

  socket.on(
    "stats:me",
    guarded("stats:me", async () => {
      socket.emit("stats:player", await stats.getPlayerStats(user.userId));
    })
  );

  socket.on(
    "stats:leaderboard",
    guarded("stats:leaderboard", async () => {
      socket.emit("stats:leaderboard", await stats.getLeaderboard());
    })
  );
}
