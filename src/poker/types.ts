export type Money = number;
export type UserId = string;
export type RoomId = string;

export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14;
export type Suit = "S" | "H" | "D" | "C";

export type Card = {
  readonly rank: Rank;
  readonly suit: Suit;
};

export type GameState = "INITIAL" | "PRE_FLOP" | "FLOP" | "TURN" | "RIVER" | "FINISHED";
export type Street = "FLOP" | "TURN" | "RIVER";

export type PlayerState = "ACTIVE" | "FOLDED" | "ALL_IN";
export type PlayerAction = "FOLD" | "CHECK" | "CALL" | "RAISE" | "ALL_IN";

/**
 * SIDE_POTS splits the pot by contribution levels and returns uncalled bets.
 * PROPORTIONAL shares each tier's pot by authorized money, capped at
 * authorized × seated players.
 */
export type SettlementMode = "SIDE_POTS" | "PROPORTIONAL";

/** A player's money, addressed by user id. Backed by the WalletLedger. */
export interface Wallet {
  readonly userId: UserId;
  value(): Promise<Money>;
  inc(amount: Money): Promise<Money>;
  authorize(handId: string, amount: Money): Promise<void>;
  authorizeAll(handId: string): Promise<Money>;
  authorizedMoney(handId: string): Promise<Money>;
  approve(handId: string): Promise<void>;
  /** Credits `payout` and clears the hand's escrow together; false if already cleared. */
  settle(handId: string, payout: Money): Promise<boolean>;
  refund(handId: string): Promise<Money>;
  addDaily(amount: Money): Promise<Money>;
  hasDailyBonus(): Promise<boolean>;
}

export type Player = {
  userId: UserId;
  handle: string;
  wallet: Wallet;
  state: PlayerState;
  cards: Card[];
  /** Chips put in during the current betting round. */
  roundRate: Money;
  lastActionAt: number | null;
};

export type TableConfig = {
  smallBlind: Money;
  bigBlind: Money;
  minPlayers: number;
  maxPlayers: number;
  maxTurnMs: number;
  settlement: SettlementMode;
};

export type Game = {
  /** Hand id; regenerated on every reset. */
  id: string;
  state: GameState;
  players: Player[];
  pot: Money;
  maxRoundRate: Money;
  currentPlayerIndex: number;
  cardsTable: Card[];
  deck: Card[];
  /** Seat whose turn closes the betting round. */
  tradingEndUserId: UserId | null;
  config: TableConfig;
  createdAt: number;
  lastTurnTime: number;
  /** Payouts being credited; set while a showdown is paying out. */
  settling: Map<UserId, Money> | null;
};

export type HandTier = Array<{ player: Player; bestHand: Card[] }>;

export type Payout = {
  player: Player;
  bestHand: Card[];
  amount: Money;
};

export type WinnerView = {
  userId: UserId;
  handle: string;
  amount: Money;
  bestHand: string[];
  description: string | null;
};

export type TableEvent =
  | { type: "PLAYER_SEATED"; handId: string; userId: UserId; handle: string; seated: number }
  | { type: "HAND_STARTED"; handId: string; startedAt: number; players: Array<{ userId: UserId; handle: string }> }
  | { type: "PRIVATE_CARDS"; handId: string; userId: UserId; cards: string[] }
  | {
      type: "BLINDS_POSTED";
      handId: string;
      smallBlind: { userId: UserId; amount: Money };
      bigBlind: { userId: UserId; amount: Money };
    }
  | { type: "PLAYER_ACTED"; handId: string; userId: UserId; action: PlayerAction; amount: Money; timeout: boolean }
  | { type: "BOARD_DEALT"; handId: string; street: Street; board: string[] }
  | {
      type: "TURN";
      handId: string;
      userId: UserId;
      toCall: Money;
      balance: Money;
      pot: Money;
      actions: PlayerAction[];
      raiseOptions: Money[];
      endsAt: number;
    }
  | {
      type: "HAND_ENDED";
      handId: string;
      startedAt: number;
      endedAt: number;
      pot: Money;
      board: string[];
      onlyOnePlayer: boolean;
      winners: WinnerView[];
      players: Array<{ userId: UserId; handle: string; committed: Money; folded: boolean }>;
    }
  | { type: "HAND_ABORTED"; handId: string; reason: string };

export type PublicTableEvent = Exclude<TableEvent, { type: "PRIVATE_CARDS" }>;

export type RoomSnapshot = {
  handId: string;
  state: GameState;
  pot: Money;
  maxRoundRate: Money;
  board: string[];
  currentUserId: UserId | null;
  players: Array<{ userId: UserId; handle: string; state: PlayerState; roundRate: Money }>;
};
