import "dotenv/config";
import { validateEnv, logEnvSummary, tableConfigFromEnv } from "./config/env";

// Validate environment variables FIRST, before anything connects.
const env = validateEnv();
logEnvSummary(env);

import express from "express";
import http from "http";
import cors from "cors";
import { createRequireAuth } from "./auth";
import { errorMessage, logger } from "./lib/logger";
import { PokerEvaluatorHandEvaluator } from "./poker/evaluator";
import { RoomRegistry } from "./poker/rooms";
import { TurnTimer } from "./poker/turn-timer";
import { SocketNotifier } from "./realtime/notifier";
import { registerRoomGateway } from "./realtime/room.gateway";
import { buildSocketServer } from "./realtime/socket";
import { createRedis, RedisStore } from "./redis";
import { HandHistoryService } from "./services/hand-history.service";
import { StatsService } from "./services/stats.service";
import { WalletLedger } from "./services/wallet.service";
import { createStatsRoutes } from "./stats.routes";

const redis = createRedis(env.REDIS_URL);
const store = new RedisStore(redis);

const ledger = new WalletLedger(store, { startingStake: env.STARTING_STAKE });
const stats = new StatsService(store);
const history = new HandHistoryService(store);
const registry = new RoomRegistry({
  ledger,
  config: tableConfigFromEnv(env),
  evaluator: new PokerEvaluatorHandEvaluator(),
});
const turnTimer = new TurnTimer(registry);

const app = express();

app.use(
  cors({
    origin: env.CORS_ORIGIN,
    credentials: true,
    methods: ["GET", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  })
);
app.use(express.json());

app.get("/health", (_req: express.Request, res: express.Response) => res.json({ ok: true }));
app.use(createStatsRoutes({ requireAuth: createRequireAuth(env.JWT_SECRET), stats, history, ledger }));

const server = http.createServer(app);
const io = buildSocketServer(server, { jwtSecret: env.JWT_SECRET, corsOrigin: env.CORS_ORIGIN }, (io, socket, user) =>
  registerRoomGateway(io, socket, user, { registry, ledger, stats })
);

registry.addSink(new SocketNotifier(io));
registry.addSink(turnTimer);
registry.addSink(stats);
registry.addSink(history);

server.listen(env.PORT, () => {
  logger.info(`API listening on :${env.PORT}`);
});

// --- Graceful shutdown ---
function shutdown(signal: string) {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  turnTimer.stopAll();
  // closes the HTTP server along with every socket
  void io.close(async () => {
    try {
      await redis.quit();
      logger.info("Redis disconnected.");
    } catch (err) {
      logger.error("Error disconnecting Redis", { error: errorMessage(err) });
    }
    process.exit(0);
  });
  setTimeout(() => {
    process.exit(1);
  }, 10_000).unref();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
