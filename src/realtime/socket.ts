import type { Server as HttpServer } from "http";
import { Server, type Socket } from "socket.io";
import { z } from "zod";
import { bearerToken, verifyJwt, type JwtUser } from "../auth";
import { logger } from "../lib/logger";
import type { PublicTableEvent, RoomId, RoomSnapshot } from "../poker/types";
import type { DailyBonus } from "../services/wallet.service";
import type { PlayerStats } from "../services/stats.service";

export type ErrorEvent = { type: "ERROR"; code: string; message: string };

export type RoomEventPayload = (PublicTableEvent & { roomId: RoomId }) | ErrorEvent;

export type ActionAck = (result: { ok: boolean }) => void;

export interface ServerToClientEvents {
  "room:event": (payload: RoomEventPayload) => void;
  "room:private_cards": (payload: { roomId: RoomId; handId: string; cards: string[] }) => void;
  "room:state": (payload: RoomSnapshot & { roomId: RoomId }) => void;
  "wallet:balance": (payload: { balance: number }) => void;
  "wallet:bonus": (payload: DailyBonus) => void;
  "stats:player": (payload: PlayerStats | null) => void;
  "stats:leaderboard": (payload: PlayerStats[]) => void;
}

export interface ClientToServerEvents {
  "room:join": (payload: unknown) => void;
  "room:ready": (payload: unknown) => void;
  "room:start": (payload: unknown) => void;
  "room:action": (payload: unknown, ack?: ActionAck) => void;
  "room:cards": (payload: unknown) => void;
  "room:ban": (payload: unknown) => void;
  "wallet:balance": () => void;
  "wallet:bonus": () => void;
  "stats:me": () => void;
  "stats:leaderboard": () => void;
}

export type SocketData = { user?: JwtUser };

type InterServerEvents = Record<string, never>;

export type GameServer = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;
export type GameSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

export function buildSocketServer(
  httpServer: HttpServer,
  options: { jwtSecret: string; corsOrigin: string },
  onConnection: (io: GameServer, socket: GameSocket, user: JwtUser) => void
): GameServer {
  const io = new Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(httpServer, {
    cors: { origin: options.corsOrigin },
  });

  io.use((socket, next) => {
    const fromAuth = z.string().safeParse(socket.handshake.auth.token);
    const token = fromAuth.success ? fromAuth.data : bearerToken(socket.handshake.headers.authorization);
    if (!token) return next(new Error("UNAUTHORIZED"));

    try {
      socket.data.user = verifyJwt(token, options.jwtSecret);
    } catch {
      logger.authFailure(socket.handshake.address);
      return next(new Error("UNAUTHORIZED"));
    }
    next();
  });

  io.on("connection", (socket) => {
    const user = socket.data.user;
    if (!user) {
      socket.disconnect(true);
      return;
    }
    void socket.join(`user:${user.userId}`);
    onConnection(io, socket, user);
  });

  return io;
}
