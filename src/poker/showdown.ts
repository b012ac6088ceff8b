import { UnreachableStateError } from "./errors";
import { resetGame } from "./game";
import type { Card, Game, HandTier, Money, Payout, Player, SettlementMode, UserId } from "./types";

export type Contribution = {
  player: Player;
  /** Everything the player put in this hand. */
  authorized: Money;
};

export type Settlement = {
  pot: Money;
  payouts: Payout[];
  contributions: Contribution[];
};

function addTo(amounts: Map<UserId, Money>, userId: UserId, amount: Money) {
  amounts.set(userId, (amounts.get(userId) ?? 0) + amount);
}

/**
 * Each tier shares the pot left at its start in proportion to authorized
 * money; nobody takes more than authorized × seats. Rounding residue goes to
 * the first player of the strongest tier.
 */
export function proportionalPayouts(contributions: Contribution[], tiers: HandTier[], pot: Money): Map<UserId, Money> {
  const authorized = new Map(contributions.map((c) => [c.player.userId, c.authorized]));
  const seats = contributions.length;
  const amounts = new Map<UserId, Money>();
  let remaining = pot;

  for (const tier of tiers) {
    if (remaining <= 0) break;
    const tierTotal = tier.reduce((sum, entry) => sum + (authorized.get(entry.player.userId) ?? 0), 0);
    if (tierTotal <= 0) continue;

    const tierPot = remaining;
    for (const { player } of tier) {
      if (remaining <= 0) break;
      const own = authorized.get(player.userId) ?? 0;
      const share = Math.min(Math.round((tierPot * own) / tierTotal), own * seats, remaining);
      if (share > 0) {
        addTo(amounts, player.userId, share);
        remaining -= share;
      }
    }
  }

  const top = tiers[0]?.[0];
  if (remaining > 0 && top) addTo(amounts, top.player.userId, remaining);

  return amounts;
}

/**
 * Side pots from contribution levels. Each level goes to the strongest tier
 * among the non-folded players who reached it; odd chips go to the earliest
 * seat. A level only the over-bettor reached is returned to them.
 */
export function sidePotPayouts(contributions: Contribution[], tiers: HandTier[]): Map<UserId, Money> {
  const seatOf = new Map(contributions.map((c, index) => [c.player.userId, index]));
  const inShowdown = new Set(tiers.flatMap((tier) => tier.map((entry) => entry.player.userId)));
  const levels = Array.from(new Set(contributions.map((c) => c.authorized).filter((v) => v > 0))).sort((a, b) => a - b);
  const amounts = new Map<UserId, Money>();

  let prev = 0;
  for (const level of levels) {
    const step = level - prev;
    prev = level;

    const participants = contributions.filter((c) => c.authorized >= level);
    const eligible = new Set(participants.map((c) => c.player.userId).filter((id) => inShowdown.has(id)));

    if (eligible.size === 0) {
      for (const c of participants) addTo(amounts, c.player.userId, step);
      continue;
    }

    const winners = (tiers.map((tier) => tier.filter((entry) => eligible.has(entry.player.userId))).find((t) => t.length > 0) ?? [])
      .map((entry) => entry.player.userId)
      .sort((a, b) => (seatOf.get(a) ?? 0) - (seatOf.get(b) ?? 0));

    const amount = step * participants.length;
    const base = Math.floor(amount / winners.length);
    let rem = amount - base * winners.length;
    for (const userId of winners) {
      const extra = rem > 0 ? 1 : 0;
      rem -= extra;
      addTo(amounts, userId, base + extra);
    }
  }

  return amounts;
}

/**
 * Pays the pot out to wallets, releases every escrow and resets the game.
 * `tiers` are strongest first; a lone survivor is a single one-player tier.
 * The planned payouts stay on `game.settling` until every wallet is settled,
 * so an interrupted showdown can be finished instead of refunded.
 */
export async function settleShowdown(
  game: Game,
  tiers: HandTier[],
  mode: SettlementMode = game.config.settlement
): Promise<Settlement> {
  const contributions: Contribution[] = [];
  for (const player of game.players) {
    contributions.push({ player, authorized: await player.wallet.authorizedMoney(game.id) });
  }

  const pot = game.pot + game.players.reduce((sum, p) => sum + p.roundRate, 0);
  const escrowed = contributions.reduce((sum, c) => sum + c.authorized, 0);
  if (escrowed !== pot) {
    throw new UnreachableStateError(`Escrow ${escrowed} does not match pot ${pot} for hand ${game.id}`);
  }

  const amounts = mode === "PROPORTIONAL" ? proportionalPayouts(contributions, tiers, pot) : sidePotPayouts(contributions, tiers);

  const bestHands = new Map<UserId, Card[]>();
  for (const tier of tiers) for (const entry of tier) bestHands.set(entry.player.userId, entry.bestHand);

  const ranked = [
    ...tiers.flatMap((tier) => tier.map((entry) => entry.player)),
    ...game.players.filter((p) => !bestHands.has(p.userId)),
  ];
  const payouts: Payout[] = [];
  for (const player of ranked) {
    const amount = amounts.get(player.userId) ?? 0;
    if (amount > 0) payouts.push({ player, bestHand: bestHands.get(player.userId) ?? [], amount });
  }

  game.settling = amounts;
  await settleWallets(game, amounts);

  resetGame(game);
  return { pot, payouts, contributions };
}

/** Credits each player's payout and clears their escrow. Players already settled are skipped. */
export async function settleWallets(game: Game, amounts: Map<UserId, Money>): Promise<void> {
  for (const player of game.players) {
    await player.wallet.settle(game.id, amounts.get(player.userId) ?? 0);
  }
}
