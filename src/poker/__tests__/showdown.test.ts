import { MemoryStore } from "../../__tests__/helpers/memory-store";
import { WalletLedger } from "../../services/wallet.service";
import { UnreachableStateError } from "../errors";
import { DEFAULT_TABLE_CONFIG, createGame, createPlayer } from "../game";
import { proportionalPayouts, settleShowdown, sidePotPayouts, type Contribution } from "../showdown";
import type { HandTier, Player } from "../types";

const ledger = new WalletLedger(new MemoryStore());

function contributions(amounts: Record<string, number>): Contribution[] {
  return Object.entries(amounts).map(([id, authorized]) => ({ player: createPlayer(id, id, ledger.forPlayer(id)), authorized }));
}

function tiersOf(list: Contribution[], ...ranking: string[][]): HandTier[] {
  const byId = new Map<string, Player>(list.map((c) => [c.player.userId, c.player]));
  return ranking.map((group) =>
    group.flatMap((id) => {
      const player = byId.get(id);
      return player ? [{ player, bestHand: [] }] : [];
    })
  );
}

describe("sidePotPayouts", () => {
  it("pays each contribution level to the best hand that reached it", () => {
    const list = contributions({ A: 100, B: 300, C: 500 });
    const payouts = sidePotPayouts(list, tiersOf(list, ["A"], ["B"], ["C"]));

    expect(Object.fromEntries(payouts)).toEqual({ A: 300, B: 400, C: 200 });
  });

  it("keeps folded money in the pot without making it winnable by its owner", () => {
    const list = contributions({ A: 50, B: 100, C: 100 });
    const payouts = sidePotPayouts(list, tiersOf(list, ["B"], ["C"]));

    expect(Object.fromEntries(payouts)).toEqual({ B: 250 });
  });

  it("gives odd chips to the earliest seat of a split", () => {
    const list = contributions({ A: 5, B: 10, C: 10 });
    const payouts = sidePotPayouts(list, tiersOf(list, ["B", "C"]));

    expect(Object.fromEntries(payouts)).toEqual({ B: 13, C: 12 });
  });

  it("refunds a level nobody in the showdown reached", () => {
    const list = contributions({ A: 40, B: 60 });
    const payouts = sidePotPayouts(list, []);

    expect(Object.fromEntries(payouts)).toEqual({ A: 40, B: 60 });
  });
});

describe("proportionalPayouts", () => {
  it("caps each winner at authorized money times the seats", () => {
    const list = contributions({ A: 100, B: 300, C: 500 });
    const payouts = proportionalPayouts(list, tiersOf(list, ["A"], ["B"], ["C"]), 900);

    expect(Object.fromEntries(payouts)).toEqual({ A: 300, B: 600 });
  });

  it("shares a tie by authorized money", () => {
    const list = contributions({ A: 25, B: 25 });
    const payouts = proportionalPayouts(list, tiersOf(list, ["A", "B"]), 50);

    expect(Object.fromEntries(payouts)).toEqual({ A: 25, B: 25 });
  });

  it("hands the rounding residue to the strongest tier", () => {
    const list = contributions({ A: 1, B: 1, C: 1, D: 1 });
    const payouts = proportionalPayouts(list, tiersOf(list, ["A", "B", "C"]), 4);

    expect(Object.fromEntries(payouts)).toEqual({ A: 2, B: 1, C: 1 });
  });
});

describe("settleShowdown", () => {
  async function handWithEscrow(amounts: Record<string, number>) {
    const local = new WalletLedger(new MemoryStore());
    const game = createGame(DEFAULT_TABLE_CONFIG, 0);
    for (const [id, amount] of Object.entries(amounts)) {
      const player = createPlayer(id, id, local.forPlayer(id));
      await player.wallet.authorize(game.id, amount);
      game.players.push(player);
      game.pot += amount;
    }
    const [a, b, c] = game.players;
    return { ledger: local, game, handId: game.id, tiers: [[{ player: a, bestHand: [] }], [{ player: b, bestHand: [] }], [{ player: c, bestHand: [] }]] };
  }

  it("credits wallets, releases escrow and resets the game", async () => {
    const { ledger: local, game, handId, tiers } = await handWithEscrow({ A: 100, B: 300, C: 500 });

    const settlement = await settleShowdown(game, tiers, "SIDE_POTS");

    expect(settlement.pot).toBe(900);
    expect(settlement.payouts.map((p) => [p.player.userId, p.amount])).toEqual([
      ["A", 300],
      ["B", 400],
      ["C", 200],
    ]);
    expect(settlement.contributions.map((c) => c.authorized)).toEqual([100, 300, 500]);
    expect(await local.value("A")).toBe(1200);
    expect(await local.value("B")).toBe(1100);
    expect(await local.value("C")).toBe(700);
    expect(await local.authorizedMoney("C", handId)).toBe(0);
    expect(game.state).toBe("INITIAL");
    expect(game.players).toEqual([]);
  });

  it("follows the proportional rule when asked", async () => {
    const { ledger: local, game, tiers } = await handWithEscrow({ A: 100, B: 300, C: 500 });

    await settleShowdown(game, tiers, "PROPORTIONAL");

    expect(await local.value("A")).toBe(1200);
    expect(await local.value("B")).toBe(1300);
    expect(await local.value("C")).toBe(500);
  });

  it("refuses a pot that does not match the escrow", async () => {
    const { game, tiers } = await handWithEscrow({ A: 100, B: 300, C: 500 });
    game.pot = 800;

    await expect(settleShowdown(game, tiers)).rejects.toBeInstanceOf(UnreachableStateError);
  });
});
