import { logger } from "../lib/logger";
import { cardCode, draw, newShuffledDeck, type DeckProvider } from "./cards";
import {
  AlreadySeatedError,
  GameFullError,
  InsufficientFundsError,
  InvalidTransitionError,
  UnreachableStateError,
} from "./errors";
import type { HandEvaluator } from "./evaluator";
import { describeHand } from "./hand-labels";
import { contenders, createGame, currentPlayer, findPlayer, isBetting, playersBy, resetGame } from "./game";
import { callOrCheck, closeBettingRound, goAllIn, postBlind, raiseTo, toCall } from "./round-rate";
import { settleShowdown, settleWallets } from "./showdown";
import type {
  Card,
  Game,
  GameState,
  HandTier,
  Money,
  Player,
  PlayerAction,
  RoomId,
  RoomSnapshot,
  Street,
  TableConfig,
  TableEvent,
  UserId,
} from "./types";

export type HandEngineDeps = {
  config: TableConfig;
  evaluator: HandEvaluator;
  deckProvider?: DeckProvider;
  clock?: () => number;
};

export type SeatResult = {
  seated: number;
  dealt: boolean;
};

const NEXT_STREET: Partial<Record<GameState, { next: Street | "FINISHED"; cards: number }>> = {
  PRE_FLOP: { next: "FLOP", cards: 3 },
  FLOP: { next: "TURN", cards: 1 },
  TURN: { next: "RIVER", cards: 1 },
  RIVER: { next: "FINISHED", cards: 0 },
};

const HOLE_CARDS = 2;
const MAX_STEPS_PER_SEAT = 5;

/**
 * One room's hand: seating, blinds, streets and showdown. Not safe for
 * concurrent use; the RoomRegistry serializes calls per room. Every
 * transition is queued as a TableEvent and handed out by drainEvents().
 */
export class HandEngine {
  readonly game: Game;
  private readonly deckProvider: DeckProvider;
  private readonly clock: () => number;
  private outbox: TableEvent[] = [];

  constructor(
    readonly roomId: RoomId,
    private readonly deps: HandEngineDeps
  ) {
    this.deckProvider = deps.deckProvider ?? newShuffledDeck;
    this.clock = deps.clock ?? Date.now;
    this.game = createGame(deps.config, this.clock());
  }

  drainEvents(): TableEvent[] {
    const events = this.outbox;
    this.outbox = [];
    return events;
  }

  /**
   * Seats a player for the next hand. Deals as soon as the table holds
   * min(quorum, maxPlayers) players, and never fewer than minPlayers.
   */
  async seat(player: Player, quorum?: number): Promise<SeatResult> {
    const { game } = this;
    const { config } = game;

    if (game.state !== "INITIAL" && game.state !== "FINISHED") {
      throw new InvalidTransitionError("HAND_IN_PROGRESS", "A hand is already in progress");
    }
    if (game.players.length >= config.maxPlayers) throw new GameFullError(config.maxPlayers);
    if (findPlayer(game, player.userId)) throw new AlreadySeatedError(player.userId);

    const balance = await player.wallet.value();
    const minimum = config.smallBlind * 2;
    if (balance < minimum) throw new InsufficientFundsError(player.userId, minimum, balance);

    game.players.push(player);
    const seated = game.players.length;
    this.emit({ type: "PLAYER_SEATED", handId: game.id, userId: player.userId, handle: player.handle, seated });
    logger.playerSeated(this.roomId, player.userId, seated);

    const needed = Math.max(config.minPlayers, Math.min(quorum ?? config.maxPlayers, config.maxPlayers));
    if (seated < needed) return { seated, dealt: false };

    await this.deal();
    return { seated, dealt: true };
  }

  async deal(): Promise<void> {
    const { game } = this;
    const { config } = game;

    if (game.state !== "INITIAL") throw new InvalidTransitionError("HAND_IN_PROGRESS", "A hand is already in progress");
    if (game.players.length < config.minPlayers) {
      throw new InvalidTransitionError("NOT_ENOUGH_PLAYERS", `At least ${config.minPlayers} players are needed`);
    }

    game.createdAt = this.clock();
    game.deck = this.deckProvider();
    for (const player of game.players) {
      player.cards = draw(game.deck, HOLE_CARDS);
      player.state = "ACTIVE";
      player.roundRate = 0;
    }
    game.state = "PRE_FLOP";

    this.emit({
      type: "HAND_STARTED",
      handId: game.id,
      startedAt: game.createdAt,
      players: game.players.map((p) => ({ userId: p.userId, handle: p.handle })),
    });
    for (const player of game.players) {
      this.emit({ type: "PRIVATE_CARDS", handId: game.id, userId: player.userId, cards: player.cards.map(cardCode) });
    }
    logger.handStarted(this.roomId, game.id, game.players);

    const [small, big] = game.players;
    await this.postBlindOrAllIn(small, config.smallBlind);
    await this.postBlindOrAllIn(big, config.bigBlind - config.smallBlind);
    this.emit({
      type: "BLINDS_POSTED",
      handId: game.id,
      smallBlind: { userId: small.userId, amount: small.roundRate },
      bigBlind: { userId: big.userId, amount: big.roundRate },
    });

    const first = 2 % game.players.length;
    game.tradingEndUserId = game.players[first].userId;
    game.currentPlayerIndex = first;
    if (!(await this.landOn(first))) await this.advance();
  }

  /** Applies the current actor's move. Anything out of turn or malformed is ignored. */
  async act(userId: UserId, action: PlayerAction, amount?: Money): Promise<boolean> {
    const { game } = this;
    if (!isBetting(game)) return false;

    const player = currentPlayer(game);
    if (!player || player.userId !== userId || player.state !== "ACTIVE") return false;

    const applied = await this.apply(player, action, amount);
    if (!applied) return false;

    if (player.state === "ACTIVE" && (await player.wallet.value()) <= 0) player.state = "ALL_IN";
    this.recordAction(player, applied.taken, applied.moved, false);

    await this.advance();
    return true;
  }

  /** Folds the current actor once their turn has run past maxTurnMs. */
  async forceFold(userId: UserId, now = this.clock()): Promise<boolean> {
    const { game } = this;
    if (!isBetting(game)) return false;

    const player = currentPlayer(game);
    if (!player || player.userId !== userId || player.state !== "ACTIVE") return false;
    if (now - game.lastTurnTime < game.config.maxTurnMs) return false;

    player.state = "FOLDED";
    this.recordAction(player, "FOLD", 0, true);

    await this.advance();
    return true;
  }

  /**
   * Returns every escrow to its wallet and resets the room. A showdown that
   * already started paying out is completed with its planned payouts instead.
   */
  async abortHand(reason: string): Promise<void> {
    const { game } = this;
    const handId = game.id;

    if (game.settling) {
      await settleWallets(game, game.settling);
    } else {
      for (const player of game.players) await player.wallet.refund(handId);
    }

    resetGame(game, this.clock());
    this.emit({ type: "HAND_ABORTED", handId, reason });
    logger.handAborted(this.roomId, handId, reason);
  }

  privateCards(userId: UserId): Card[] | null {
    const player = findPlayer(this.game, userId);
    return player && player.cards.length > 0 ? player.cards.slice() : null;
  }

  snapshot(): RoomSnapshot {
    const { game } = this;
    return {
      handId: game.id,
      state: game.state,
      pot: game.pot,
      maxRoundRate: game.maxRoundRate,
      board: game.cardsTable.map(cardCode),
      currentUserId: isBetting(game) ? (currentPlayer(game)?.userId ?? null) : null,
      players: game.players.map((p) => ({ userId: p.userId, handle: p.handle, state: p.state, roundRate: p.roundRate })),
    };
  }

  private async apply(
    player: Player,
    action: PlayerAction,
    amount: Money | undefined
  ): Promise<{ taken: PlayerAction; moved: Money } | null> {
    const { game } = this;

    if (action === "FOLD") {
      player.state = "FOLDED";
      return { taken: "FOLD", moved: 0 };
    }

    if (action === "CHECK" || action === "CALL") {
      const owed = toCall(game, player);
      if (owed > 0 && (await player.wallet.value()) <= owed) {
        return { taken: "ALL_IN", moved: await goAllIn(game, player) };
      }
      return { taken: owed === 0 ? "CHECK" : "CALL", moved: await callOrCheck(game, player) };
    }

    if (action === "RAISE") {
      if (amount === undefined || !Number.isInteger(amount) || amount <= 0) return null;
      try {
        return { taken: "RAISE", moved: await raiseTo(game, player, amount) };
      } catch (err) {
        if (!(err instanceof InsufficientFundsError)) throw err;
        return { taken: "ALL_IN", moved: await goAllIn(game, player) };
      }
    }

    return { taken: "ALL_IN", moved: await goAllIn(game, player) };
  }

  private recordAction(player: Player, action: PlayerAction, amount: Money, timeout: boolean) {
    const { game } = this;
    const now = this.clock();
    player.lastActionAt = now;
    game.lastTurnTime = now;
    this.emit({ type: "PLAYER_ACTED", handId: game.id, userId: player.userId, action, amount, timeout });
    logger.playerAction(this.roomId, game.id, player.userId, action, amount, timeout);
  }

  private async postBlindOrAllIn(player: Player, amount: Money): Promise<void> {
    try {
      await postBlind(this.game, player, amount);
    } catch (err) {
      if (!(err instanceof InsufficientFundsError)) throw err;
      await goAllIn(this.game, player);
    }
  }

  /**
   * Moves the turn to the next seat that can act, closing betting rounds and
   * dealing streets on the way. Ends the hand when one contender is left.
   */
  private async advance(): Promise<void> {
    const { game } = this;
    let index = game.currentPlayerIndex;
    const limit = game.players.length * MAX_STEPS_PER_SEAT;

    for (let step = 0; step < limit; step++) {
      if (contenders(game).length <= 1) {
        await this.finish();
        return;
      }

      index = (index + 1) % game.players.length;
      if (game.players[index].userId === game.tradingEndUserId) {
        closeBettingRound(game);
        if (!(await this.nextStreet())) return;
        index = 0;
      }

      if (await this.landOn(index)) return;
    }

    throw new UnreachableStateError(`No player can act in hand ${game.id} (${game.state})`);
  }

  private async landOn(index: number): Promise<boolean> {
    const { game } = this;
    const player = game.players[index];
    const balance = await player.wallet.value();
    if (player.state === "ACTIVE" && balance <= 0) player.state = "ALL_IN";
    if (player.state !== "ACTIVE") return false;

    game.currentPlayerIndex = index;
    game.lastTurnTime = this.clock();

    const { bigBlind } = game.config;
    const owed = toCall(game, player);
    const actions: PlayerAction[] = ["FOLD", owed === 0 ? "CHECK" : "CALL"];
    if (balance > owed) actions.push("RAISE");
    actions.push("ALL_IN");

    this.emit({
      type: "TURN",
      handId: game.id,
      userId: player.userId,
      toCall: owed,
      balance,
      pot: game.pot + game.players.reduce((sum, p) => sum + p.roundRate, 0),
      actions,
      raiseOptions: [bigBlind, Math.round(bigBlind * 2.5), bigBlind * 5].filter((option) => option <= balance - owed),
      endsAt: game.lastTurnTime + game.config.maxTurnMs,
    });
    return true;
  }

  /** Deals the next street. False once the hand is over. */
  private async nextStreet(): Promise<boolean> {
    const { game } = this;
    const step = NEXT_STREET[game.state];
    if (!step) throw new UnreachableStateError(`No street follows ${game.state}`);

    if (step.next === "FINISHED") {
      await this.finish();
      return false;
    }
    this.dealStreet(step.next, step.cards);

    for (const player of playersBy(game, (p) => p.state === "ACTIVE")) {
      if ((await player.wallet.value()) <= 0) player.state = "ALL_IN";
    }
    if (playersBy(game, (p) => p.state === "ACTIVE").length <= 1) {
      await this.runOut();
      return false;
    }
    return true;
  }

  private dealStreet(street: Street, cards: number) {
    const { game } = this;
    game.cardsTable.push(...draw(game.deck, cards));
    game.state = street;
    this.emit({ type: "BOARD_DEALT", handId: game.id, street, board: game.cardsTable.map(cardCode) });
  }

  /** Nobody can bet any more: deal the rest of the board and settle. */
  private async runOut(): Promise<void> {
    let step = NEXT_STREET[this.game.state];
    while (step && step.next !== "FINISHED") {
      this.dealStreet(step.next, step.cards);
      step = NEXT_STREET[this.game.state];
    }
    await this.finish();
  }

  private async finish(): Promise<void> {
    const { game } = this;
    closeBettingRound(game);

    const handId = game.id;
    const startedAt = game.createdAt;
    const board = game.cardsTable.map(cardCode);
    const live = contenders(game);
    const onlyOnePlayer = live.length === 1;
    const tiers: HandTier[] = onlyOnePlayer
      ? [[{ player: live[0], bestHand: [] }]]
      : this.deps.evaluator.evaluate(live, game.cardsTable);
    game.state = "FINISHED";

    const settlement = await settleShowdown(game, tiers, game.config.settlement);
    const winners = settlement.payouts.map((payout) => ({
      userId: payout.player.userId,
      handle: payout.player.handle,
      amount: payout.amount,
      bestHand: payout.bestHand.map(cardCode),
      description: describeHand(payout.bestHand),
    }));

    this.emit({
      type: "HAND_ENDED",
      handId,
      startedAt,
      endedAt: this.clock(),
      pot: settlement.pot,
      board,
      onlyOnePlayer,
      winners,
      players: settlement.contributions.map((c) => ({
        userId: c.player.userId,
        handle: c.player.handle,
        committed: c.authorized,
        folded: c.player.state === "FOLDED",
      })),
    });
    logger.handEnded(this.roomId, handId, settlement.pot, winners);
  }

  private emit(event: TableEvent) {
    this.outbox.push(event);
  }
}
