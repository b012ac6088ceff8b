import type { Money, UserId } from "./types";

export type PokerErrorCode =
  | "INSUFFICIENT_FUNDS"
  | "ALREADY_CLAIMED"
  | "GAME_FULL"
  | "ALREADY_SEATED"
  | "INVALID_TRANSITION"
  | "UNREACHABLE_STATE";

/** Base class for failures a player can be told about. */
export class PokerError extends Error {
  constructor(
    readonly code: PokerErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InsufficientFundsError extends PokerError {
  constructor(
    readonly userId: UserId,
    readonly requested: Money,
    readonly available: Money
  ) {
    super("INSUFFICIENT_FUNDS", `Insufficient funds: requested ${requested}, available ${available}`);
  }
}

export class AlreadyClaimedError extends PokerError {
  constructor(readonly userId: UserId) {
    super("ALREADY_CLAIMED", "Daily bonus already claimed today");
  }
}

export class GameFullError extends PokerError {
  constructor(readonly maxPlayers: number) {
    super("GAME_FULL", `The table is full (${maxPlayers} players)`);
  }
}

export class AlreadySeatedError extends PokerError {
  constructor(readonly userId: UserId) {
    super("ALREADY_SEATED", "Already seated at this table");
  }
}

export type TransitionReason = "HAND_IN_PROGRESS" | "NOT_ENOUGH_PLAYERS" | "NOT_YOUR_TURN" | "NO_HAND";

export class InvalidTransitionError extends PokerError {
  constructor(
    readonly reason: TransitionReason,
    message: string = reason
  ) {
    super("INVALID_TRANSITION", message);
  }
}

/** The hand reached a state the engine cannot continue from. The room's hand is aborted. */
export class UnreachableStateError extends PokerError {
  constructor(message: string) {
    super("UNREACHABLE_STATE", message);
  }
}
