import type { Game, Money, Player } from "./types";

/**
 * Round-rate accounting. `roundRate` is what a player put in during the
 * current betting round; `maxRoundRate` is the high-water mark. Money moves
 * wallet → escrow here and escrow stays authorized until settlement.
 */

function markHighWater(game: Game, player: Player) {
  if (player.roundRate > game.maxRoundRate) {
    game.maxRoundRate = player.roundRate;
    game.tradingEndUserId = player.userId;
  }
}

/** Raises by `amount` over the current high-water mark. Returns the chips moved. */
export async function raiseTo(game: Game, player: Player, amount: Money): Promise<Money> {
  const delta = amount + game.maxRoundRate - player.roundRate;
  await player.wallet.authorize(game.id, delta);
  player.roundRate += delta;
  game.maxRoundRate = player.roundRate;
  game.tradingEndUserId = player.userId;
  return delta;
}

export async function postBlind(game: Game, player: Player, amount: Money): Promise<Money> {
  const delta = amount + game.maxRoundRate - player.roundRate;
  await player.wallet.authorize(game.id, delta);
  player.roundRate += delta;
  markHighWater(game, player);
  return delta;
}

/** Matches the high-water mark. Zero chips moved is a check. */
export async function callOrCheck(game: Game, player: Player): Promise<Money> {
  const delta = game.maxRoundRate - player.roundRate;
  if (delta > 0) {
    await player.wallet.authorize(game.id, delta);
    player.roundRate += delta;
  }
  return delta;
}

/** Puts the whole balance in. Re-opens betting only if it tops the high-water mark. */
export async function goAllIn(game: Game, player: Player): Promise<Money> {
  const amount = await player.wallet.authorizeAll(game.id);
  player.roundRate += amount;
  player.state = "ALL_IN";
  markHighWater(game, player);
  return amount;
}

export function closeBettingRound(game: Game): void {
  for (const player of game.players) {
    game.pot += player.roundRate;
    player.roundRate = 0;
  }
  game.maxRoundRate = 0;
  game.tradingEndUserId = game.players[0]?.userId ?? null;
}

export function toCall(game: Game, player: Player): Money {
  return Math.max(0, game.maxRoundRate - player.roundRate);
}
