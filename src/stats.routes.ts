/**
 * Stats, leaderboard, wallet and hand history routes - factory function
 */

import express, { type Request, type RequestHandler, type Response } from "express";
import { authedUser } from "./auth";
import { errorMessage, logger } from "./lib/logger";
import type { HandHistoryService } from "./services/hand-history.service";
import type { StatsService } from "./services/stats.service";
import type { WalletLedger } from "./services/wallet.service";

export type StatsRoutesDeps = {
  requireAuth: RequestHandler;
  stats: StatsService;
  history: HandHistoryService;
  ledger: WalletLedger;
};

function limitParam(value: unknown, fallback: number, max: number): number {
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? Math.min(n, max) : fallback;
}

function failed(res: Response, what: string, err: unknown) {
  logger.error(`Failed to fetch ${what}`, { error: errorMessage(err) });
  res.status(500).json({ error: `Failed to fetch ${what}` });
}

export function createStatsRoutes({ requireAuth, stats, history, ledger }: StatsRoutesDeps) {
  const router = express.Router();

  /**
   * GET /leaderboard
   * Query params:
   * - limit: number (default: 10, max: 100)
   */
  router.get("/leaderboard", async (req: Request, res: Response) => {
    try {
      const leaderboard = await stats.getLeaderboard(limitParam(req.query.limit, 10, 100));
      res.json({ leaderboard });
    } catch (err) {
      failed(res, "leaderboard", err);
    }
  });

  router.get("/stats/me", requireAuth, async (_req: Request, res: Response) => {
    try {
      const playerStats = await stats.getPlayerStats(authedUser(res).userId);
      if (!playerStats) {
        res.status(404).json({ error: "Stats not found" });
        return;
      }
      res.json({ stats: playerStats });
    } catch (err) {
      failed(res, "stats", err);
    }
  });

  router.get("/stats/:userId", async (req: Request, res: Response) => {
    try {
      const playerStats = await stats.getPlayerStats(req.params.userId);
      if (!playerStats) {
        res.status(404).json({ error: "Stats not found" });
        return;
      }
      res.json({ stats: playerStats });
    } catch (err) {
      failed(res, "stats", err);
    }
  });

  router.get("/wallet", requireAuth, async (_req: Request, res: Response) => {
    try {
      const { userId } = authedUser(res);
      const [balance, bonusClaimed] = await Promise.all([ledger.value(userId), ledger.hasDailyBonus(userId)]);
      res.json({ wallet: { balance, bonusClaimed } });
    } catch (err) {
      failed(res, "wallet", err);
    }
  });

  /**
   * GET /rooms/:roomId/history
   * Query params:
   * - limit: number (default: 10, max: 50)
   */
  router.get("/rooms/:roomId/history", async (req: Request, res: Response) => {
    try {
      const hands = await history.getRoomHistory(req.params.roomId, limitParam(req.query.limit, 10, 50));
      res.json({ hands });
    } catch (err) {
      failed(res, "hand history", err);
    }
  });

  return router;
}
