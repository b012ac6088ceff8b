import { cardCode } from "./cards";
import type { Card, HandTier, Player } from "./types";

export interface HandEvaluator {
  /** Contenders grouped by equal strength, strongest tier first, seat order inside a tier. */
  evaluate(players: Player[], board: Card[]): HandTier[];
}

type EvalResult = { value?: number; handName?: string };
type PokerEvaluatorModule = { evalHand(cards: string[]): EvalResult };

// CommonJS require() typed by the aliases above: only evalHand and the
// result fields read here are declared.
// eslint-disable-next-line @typescript-eslint/no-var-requires
const PokerEvaluator: PokerEvaluatorModule = require("poker-evaluator");

function combinations<T>(items: T[], size: number): T[][] {
  if (size === 0) return [[]];
  if (items.length < size) return [];
  const [head, ...rest] = items;
  return [...combinations(rest, size - 1).map((combo) => [head, ...combo]), ...combinations(rest, size)];
}

export function handValue(cards: Card[]): number {
  return Number(PokerEvaluator.evalHand(cards.map(cardCode)).value ?? 0);
}

/** Strongest five of up to seven cards. */
export function bestFive(cards: Card[]): { bestHand: Card[]; value: number } {
  if (cards.length <= 5) return { bestHand: cards.slice(), value: handValue(cards) };

  let best: { bestHand: Card[]; value: number } = { bestHand: [], value: -Infinity };
  for (const combo of combinations(cards, 5)) {
    const value = handValue(combo);
    if (value > best.value) best = { bestHand: combo, value };
  }
  return best;
}

export class PokerEvaluatorHandEvaluator implements HandEvaluator {
  evaluate(players: Player[], board: Card[]): HandTier[] {
    const scored = players.map((player) => ({ player, ...bestFive([...player.cards, ...board]) }));
    const values = Array.from(new Set(scored.map((s) => s.value))).sort((a, b) => b - a);
    return values.map((value) =>
      scored.filter((s) => s.value === value).map(({ player, bestHand }) => ({ player, bestHand }))
    );
  }
}
