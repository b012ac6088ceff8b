import type { Card } from "./types";

/** Weakest to strongest. */
export const HAND_LABELS = [
  "High Card",
  "Pair",
  "Two Pair",
  "Three of a Kind",
  "Straight",
  "Flush",
  "Full House",
  "Four of a Kind",
  "Straight Flush",
  "Royal Flush",
] as const;

export type HandLabel = (typeof HAND_LABELS)[number];

function isStraight(ranks: number[]): boolean {
  const unique = Array.from(new Set(ranks)).sort((a, b) => a - b);
  if (unique.length !== 5) return false;
  if (unique[4] - unique[0] === 4) return true;
  // wheel: A-2-3-4-5
  return unique.join(",") === "2,3,4,5,14";
}

/** Cosmetic label of a five-card hand; null for anything else. */
export function describeHand(cards: Card[]): HandLabel | null {
  if (cards.length !== 5) return null;

  const ranks = cards.map((c) => c.rank);
  const flush = cards.every((c) => c.suit === cards[0].suit);
  const straight = isStraight(ranks);

  const counts = new Map<number, number>();
  for (const rank of ranks) counts.set(rank, (counts.get(rank) ?? 0) + 1);
  const groups = Array.from(counts.values()).sort((a, b) => b - a);

  if (straight && flush) return Math.min(...ranks) === 10 ? "Royal Flush" : "Straight Flush";
  if (groups[0] === 4) return "Four of a Kind";
  if (groups[0] === 3 && groups[1] === 2) return "Full House";
  if (flush) return "Flush";
  if (straight) return "Straight";
  if (groups[0] === 3) return "Three of a Kind";
  if (groups[0] === 2 && groups[1] === 2) return "Two Pair";
  if (groups[0] === 2) return "Pair";
  return "High Card";
}

export function labelStrength(label: string): number {
  return HAND_LABELS.findIndex((l) => l === label);
}
