import type { Card, Rank, Suit } from "./types";

const RANKS: readonly Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14];
const SUITS: readonly Suit[] = ["S", "H", "D", "C"];

const RANK_CHARS = "23456789TJQKA";

export type DeckProvider = () => Card[];

export function buildDeck(): Card[] {
  const deck: Card[] = [];
  for (const rank of RANKS) for (const suit of SUITS) deck.push({ rank, suit });
  return deck;
}

// Fisher–Yates
export function shuffle<T>(deck: T[], rng = Math.random): T[] {
  const a = deck.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}

export const newShuffledDeck: DeckProvider = () => shuffle(buildDeck());

/** Takes `n` cards from the end of the deck, in pop order. */
export function draw(deck: Card[], n: number): Card[] {
  const drawn: Card[] = [];
  for (let i = 0; i < n; i++) {
    const card = deck.pop();
    if (!card) throw new Error(`Deck exhausted after ${drawn.length} of ${n} cards`);
    drawn.push(card);
  }
  return drawn;
}

/** "As", "Td", "2c": the notation poker-evaluator reads. */
export function cardCode(card: Card): string {
  return `${RANK_CHARS[card.rank - 2]}${card.suit.toLowerCase()}`;
}
