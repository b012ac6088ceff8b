import { KeyedLock } from "../lib/keyed-lock";
import type { KeyValueStore } from "../lib/kv";
import { AlreadyClaimedError, InsufficientFundsError } from "../poker/errors";
import type { Money, UserId, Wallet } from "../poker/types";

export const DEFAULT_STARTING_STAKE: Money = 1000;

/** Dice roll 1..6 picks one of these. */
export const DICE_BONUSES: readonly Money[] = [5, 20, 40, 80, 160, 320];
/** Saturday slot roll 1..64, paid at this rate per point. */
export const SLOT_BONUS_RATE: Money = 20;
const SLOT_FACES = 64;
const SATURDAY = 6;

export type WalletLedgerOptions = {
  startingStake?: Money;
  now?: () => Date;
};

export type DailyBonus = {
  roll: number;
  bonus: Money;
  balance: Money;
};

const balanceKey = (userId: UserId) => `wallet:${userId}`;
const dailyKey = (userId: UserId) => `wallet:${userId}:daily`;
const handKey = (userId: UserId, handId: string) => `wallet:${userId}:hand:${handId}`;

function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function assertAmount(amount: Money) {
  if (!Number.isInteger(amount) || amount < 0) throw new Error(`INVALID_AMOUNT: ${amount}`);
}

/**
 * Free balances and per-hand escrow. Every mutation for one player runs
 * under that player's lock, independent of any room lock.
 */
export class WalletLedger {
  private readonly startingStake: Money;
  private readonly now: () => Date;

  constructor(
    private readonly store: KeyValueStore,
    options: WalletLedgerOptions = {},
    private readonly locks = new KeyedLock()
  ) {
    this.startingStake = options.startingStake ?? DEFAULT_STARTING_STAKE;
    this.now = options.now ?? (() => new Date());
  }

  forPlayer(userId: UserId): Wallet {
    return {
      userId,
      value: () => this.value(userId),
      inc: (amount) => this.inc(userId, amount),
      authorize: (handId, amount) => this.authorize(userId, handId, amount),
      authorizeAll: (handId) => this.authorizeAll(userId, handId),
      authorizedMoney: (handId) => this.authorizedMoney(userId, handId),
      approve: (handId) => this.approve(userId, handId),
      settle: (handId, payout) => this.settle(userId, handId, payout),
      refund: (handId) => this.refund(userId, handId),
      addDaily: (amount) => this.addDaily(userId, amount),
      hasDailyBonus: () => this.hasDailyBonus(userId),
    };
  }

  value(userId: UserId): Promise<Money> {
    return this.locks.run(userId, () => this.readBalance(userId));
  }

  inc(userId: UserId, amount: Money): Promise<Money> {
    return this.locks.run(userId, async () => {
      const balance = await this.readBalance(userId);
      const next = balance + amount;
      if (next < 0) throw new InsufficientFundsError(userId, -amount, balance);
      await this.store.set(balanceKey(userId), String(next));
      return next;
    });
  }

  async authorize(userId: UserId, handId: string, amount: Money): Promise<void> {
    assertAmount(amount);
    return this.locks.run(userId, async () => {
      const balance = await this.readBalance(userId);
      if (amount > balance) throw new InsufficientFundsError(userId, amount, balance);
      await this.store.transaction([
        { op: "set", key: balanceKey(userId), value: String(balance - amount) },
        { op: "incrBy", key: handKey(userId, handId), delta: amount },
      ]);
    });
  }

  authorizeAll(userId: UserId, handId: string): Promise<Money> {
    return this.locks.run(userId, async () => {
      const balance = await this.readBalance(userId);
      await this.store.transaction([
        { op: "set", key: balanceKey(userId), value: "0" },
        { op: "incrBy", key: handKey(userId, handId), delta: balance },
      ]);
      return balance;
    });
  }

  authorizedMoney(userId: UserId, handId: string): Promise<Money> {
    return this.locks.run(userId, async () => {
      const raw = await this.store.get(handKey(userId, handId));
      return raw === null ? 0 : Number(raw);
    });
  }

  approve(userId: UserId, handId: string): Promise<void> {
    return this.locks.run(userId, () => this.store.del(handKey(userId, handId)));
  }

  /**
   * Credits a showdown payout and clears the hand's escrow in one write.
   * False when there was no escrow left to clear, i.e. the player was
   * already settled or never put money in.
   */
  async settle(userId: UserId, handId: string, payout: Money): Promise<boolean> {
    assertAmount(payout);
    return this.locks.run(userId, async () => {
      const held = await this.store.get(handKey(userId, handId));
      if (held === null) return false;
      await this.release(userId, handId, payout);
      return true;
    });
  }

  /** Returns the hand's escrow to the free balance. Resolves to the amount returned. */
  refund(userId: UserId, handId: string): Promise<Money> {
    return this.locks.run(userId, async () => {
      const held = await this.store.get(handKey(userId, handId));
      if (held === null) return 0;
      await this.release(userId, handId, Number(held));
      return Number(held);
    });
  }

  async addDaily(userId: UserId, amount: Money): Promise<Money> {
    assertAmount(amount);
    return this.locks.run(userId, async () => {
      const today = utcDay(this.now());
      if ((await this.store.get(dailyKey(userId))) === today) throw new AlreadyClaimedError(userId);

      const next = (await this.readBalance(userId)) + amount;
      await this.store.transaction([
        { op: "set", key: dailyKey(userId), value: today },
        { op: "set", key: balanceKey(userId), value: String(next) },
      ]);
      return next;
    });
  }

  hasDailyBonus(userId: UserId): Promise<boolean> {
    return this.locks.run(userId, async () => (await this.store.get(dailyKey(userId))) === utcDay(this.now()));
  }

  /**
   * Rolls today's bonus: a die on weekdays and Sundays, a 64-face slot on
   * Saturdays (UTC). Throws AlreadyClaimedError on the second claim of a day.
   */
  async claimDailyBonus(userId: UserId, rng: () => number = Math.random): Promise<DailyBonus> {
    let roll: number;
    let bonus: Money;
    if (this.now().getUTCDay() === SATURDAY) {
      roll = Math.floor(rng() * SLOT_FACES) + 1;
      bonus = roll * SLOT_BONUS_RATE;
    } else {
      roll = Math.floor(rng() * DICE_BONUSES.length) + 1;
      bonus = DICE_BONUSES[roll - 1];
    }

    const balance = await this.addDaily(userId, bonus);
    return { roll, bonus, balance };
  }

  private async release(userId: UserId, handId: string, credit: Money): Promise<void> {
    const balance = await this.readBalance(userId);
    await this.store.transaction([
      { op: "set", key: balanceKey(userId), value: String(balance + credit) },
      { op: "del", key: handKey(userId, handId) },
    ]);
  }

  private async readBalance(userId: UserId): Promise<Money> {
    const raw = await this.store.get(balanceKey(userId));
    if (raw !== null) return Number(raw);
    await this.store.set(balanceKey(userId), String(this.startingStake));
    return this.startingStake;
  }
}
