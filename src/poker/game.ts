import { randomUUID } from "crypto";
import type { Game, Player, TableConfig, UserId, Wallet } from "./types";

export const DEFAULT_TABLE_CONFIG: TableConfig = {
  smallBlind: 5,
  bigBlind: 10,
  minPlayers: 2,
  maxPlayers: 8,
  maxTurnMs: 2 * 60 * 1000,
  settlement: "SIDE_POTS",
};

export function createGame(config: TableConfig, now = Date.now()): Game {
  return {
    id: randomUUID(),
    state: "INITIAL",
    players: [],
    pot: 0,
    maxRoundRate: 0,
    currentPlayerIndex: 0,
    cardsTable: [],
    deck: [],
    tradingEndUserId: null,
    config,
    createdAt: now,
    lastTurnTime: now,
    settling: null,
  };
}

/** Back to INITIAL with a new hand id. Only the table configuration survives. */
export function resetGame(game: Game, now = Date.now()): void {
  Object.assign(game, createGame(game.config, now));
}

export function createPlayer(userId: UserId, handle: string, wallet: Wallet): Player {
  return {
    userId,
    handle,
    wallet,
    state: "ACTIVE",
    cards: [],
    roundRate: 0,
    lastActionAt: null,
  };
}

export function playersBy(game: Game, predicate: (player: Player) => boolean): Player[] {
  return game.players.filter(predicate);
}

/** Players still holding cards: ACTIVE or ALL_IN. */
export function contenders(game: Game): Player[] {
  return playersBy(game, (p) => p.state !== "FOLDED");
}

export function currentPlayer(game: Game): Player | undefined {
  return game.players[game.currentPlayerIndex];
}

export function findPlayer(game: Game, userId: UserId): Player | undefined {
  return game.players.find((p) => p.userId === userId);
}

export function isBetting(game: Game): boolean {
  return game.state === "PRE_FLOP" || game.state === "FLOP" || game.state === "TURN" || game.state === "RIVER";
}
