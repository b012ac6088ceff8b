import { KeyedLock } from "../lib/keyed-lock";
import { errorMessage, logger } from "../lib/logger";
import type { WalletLedger } from "../services/wallet.service";
import type { DeckProvider } from "./cards";
import { PokerError, UnreachableStateError } from "./errors";
import type { HandEvaluator } from "./evaluator";
import { createPlayer, currentPlayer, isBetting } from "./game";
import { HandEngine, type SeatResult } from "./hand-engine";
import type { Card, Money, PlayerAction, RoomId, RoomSnapshot, TableConfig, TableEvent, UserId } from "./types";

/** Receives table events after the room lock is released. Must not block. */
export interface TableEventSink {
  handle(roomId: RoomId, event: TableEvent): void;
}

export type RoomRegistryDeps = {
  ledger: WalletLedger;
  config: TableConfig;
  evaluator: HandEvaluator;
  deckProvider?: DeckProvider;
  clock?: () => number;
};

/**
 * One HandEngine per chat room, created on first use. Calls for a room are
 * serialized on that room's lock; different rooms never wait on each other.
 */
export class RoomRegistry {
  private readonly engines = new Map<RoomId, HandEngine>();
  private readonly locks = new KeyedLock();
  private readonly sinks: TableEventSink[] = [];

  constructor(private readonly deps: RoomRegistryDeps) {}

  addSink(sink: TableEventSink) {
    this.sinks.push(sink);
  }

  seat(roomId: RoomId, userId: UserId, handle: string, quorum?: number): Promise<SeatResult> {
    const player = createPlayer(userId, handle, this.deps.ledger.forPlayer(userId));
    return this.run(roomId, (engine) => engine.seat(player, quorum));
  }

  start(roomId: RoomId): Promise<void> {
    return this.run(roomId, (engine) => engine.deal());
  }

  act(roomId: RoomId, userId: UserId, action: PlayerAction, amount?: Money): Promise<boolean> {
    return this.run(roomId, (engine) => engine.act(userId, action, amount));
  }

  /** Folds `userId`, or the current actor when omitted, if their turn has expired. */
  forceFold(roomId: RoomId, userId?: UserId): Promise<boolean> {
    return this.run(roomId, async (engine) => {
      const target = userId ?? currentPlayer(engine.game)?.userId;
      return target === undefined ? false : engine.forceFold(target);
    });
  }

  privateCards(roomId: RoomId, userId: UserId): Promise<Card[] | null> {
    return this.run(roomId, async (engine) => engine.privateCards(userId));
  }

  snapshot(roomId: RoomId): Promise<RoomSnapshot> {
    return this.run(roomId, async (engine) => engine.snapshot());
  }

  isLocked(roomId: RoomId): boolean {
    return this.locks.isLocked(roomId);
  }

  get size(): number {
    return this.engines.size;
  }

  private engineFor(roomId: RoomId): HandEngine {
    let engine = this.engines.get(roomId);
    if (!engine) {
      engine = new HandEngine(roomId, this.deps);
      this.engines.set(roomId, engine);
    }
    return engine;
  }

  private async run<T>(roomId: RoomId, task: (engine: HandEngine) => Promise<T>): Promise<T> {
    const engine = this.engineFor(roomId);
    let events: TableEvent[] = [];

    try {
      return await this.locks.run(roomId, async () => {
        try {
          return await task(engine);
        } catch (err) {
          if (err instanceof PokerError && !(err instanceof UnreachableStateError)) throw err;
          if (!isBetting(engine.game) && engine.game.state !== "FINISHED") {
            logger.error("Room operation failed", { roomId, handId: engine.game.id, error: errorMessage(err) });
            throw err;
          }
          logger.error("Room operation failed, aborting hand", { roomId, handId: engine.game.id, error: errorMessage(err) });
          await engine.abortHand(errorMessage(err));
          throw err;
        } finally {
          events = engine.drainEvents();
        }
      });
    } finally {
      this.dispatch(roomId, events);
    }
  }

  private dispatch(roomId: RoomId, events: TableEvent[]) {
    for (const event of events) {
      for (const sink of this.sinks) {
        try {
          sink.handle(roomId, event);
        } catch (err) {
          logger.error("Table event sink failed", { roomId, event: event.type, error: errorMessage(err) });
        }
      }
    }
  }
}
