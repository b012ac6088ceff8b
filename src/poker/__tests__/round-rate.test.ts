import { MemoryStore } from "../../__tests__/helpers/memory-store";
import { WalletLedger } from "../../services/wallet.service";
import { InsufficientFundsError } from "../errors";
import { DEFAULT_TABLE_CONFIG, createGame, createPlayer, resetGame } from "../game";
import { callOrCheck, closeBettingRound, goAllIn, postBlind, raiseTo } from "../round-rate";

function setup(...userIds: string[]) {
  const ledger = new WalletLedger(new MemoryStore());
  const game = createGame(DEFAULT_TABLE_CONFIG, 0);
  game.players = userIds.map((id) => createPlayer(id, id, ledger.forPlayer(id)));
  return { ledger, game, players: game.players };
}

describe("round-rate accounting", () => {
  it("posts blinds as raises over the running high-water mark", async () => {
    const { game, players, ledger } = setup("A", "B");
    const [a, b] = players;

    await expect(postBlind(game, a, 5)).resolves.toBe(5);
    await expect(postBlind(game, b, 5)).resolves.toBe(10);

    expect([a.roundRate, b.roundRate]).toEqual([5, 10]);
    expect(game.maxRoundRate).toBe(10);
    expect(game.tradingEndUserId).toBe("B");
    expect(await ledger.authorizedMoney("B", game.id)).toBe(10);
  });

  it("raises by the amount over the high-water mark and takes the closing seat", async () => {
    const { game, players, ledger } = setup("A", "B");
    const [a, b] = players;
    await postBlind(game, a, 5);
    await postBlind(game, b, 5);

    await expect(raiseTo(game, a, 15)).resolves.toBe(20);

    expect(a.roundRate).toBe(25);
    expect(game.maxRoundRate).toBe(25);
    expect(game.tradingEndUserId).toBe("A");
    expect(await ledger.value("A")).toBe(975);
  });

  it("calls without moving the closing seat", async () => {
    const { game, players } = setup("A", "B");
    const [a, b] = players;
    await postBlind(game, a, 5);
    await postBlind(game, b, 5);
    await raiseTo(game, a, 15);

    await expect(callOrCheck(game, b)).resolves.toBe(15);
    await expect(callOrCheck(game, b)).resolves.toBe(0);

    expect(b.roundRate).toBe(25);
    expect(game.tradingEndUserId).toBe("A");
  });

  it("refuses a raise the wallet cannot cover and leaves the round untouched", async () => {
    const { game, players } = setup("A");
    const [a] = players;

    await expect(raiseTo(game, a, 1001)).rejects.toBeInstanceOf(InsufficientFundsError);
    expect(a.roundRate).toBe(0);
    expect(game.maxRoundRate).toBe(0);
  });

  it("caps a short all-in without re-opening the betting", async () => {
    const { game, players, ledger } = setup("A", "B", "C");
    const [a, b, c] = players;
    await ledger.inc("C", -992);
    await postBlind(game, a, 5);
    await postBlind(game, b, 5);

    await expect(goAllIn(game, c)).resolves.toBe(8);

    expect(c.state).toBe("ALL_IN");
    expect(c.roundRate).toBe(8);
    expect(game.maxRoundRate).toBe(10);
    expect(game.tradingEndUserId).toBe("B");
  });

  it("re-opens the betting when an all-in tops the high-water mark", async () => {
    const { game, players } = setup("A", "B");
    const [a, b] = players;
    await postBlind(game, a, 5);

    await goAllIn(game, b);

    expect(game.maxRoundRate).toBe(1000);
    expect(game.tradingEndUserId).toBe("B");
  });

  it("moves round rates into the pot when the round closes", async () => {
    const { game, players } = setup("A", "B", "C");
    const [a, b, c] = players;
    await postBlind(game, a, 5);
    await postBlind(game, b, 5);
    await callOrCheck(game, c);

    closeBettingRound(game);

    expect(game.pot).toBe(25);
    expect(players.map((p) => p.roundRate)).toEqual([0, 0, 0]);
    expect(game.maxRoundRate).toBe(0);
    expect(game.tradingEndUserId).toBe("A");
  });
});

describe("resetGame", () => {
  it("is idempotent and keeps only the table configuration", () => {
    const config = { ...DEFAULT_TABLE_CONFIG, smallBlind: 25, bigBlind: 50 };
    const game = createGame(config, 0);
    game.state = "RIVER";
    game.pot = 120;
    const firstId = game.id;

    resetGame(game, 10);
    const secondId = game.id;
    resetGame(game, 20);

    expect(game).toMatchObject({
      state: "INITIAL",
      players: [],
      pot: 0,
      maxRoundRate: 0,
      cardsTable: [],
      tradingEndUserId: null,
      createdAt: 20,
    });
    expect(game.config).toBe(config);
    expect(new Set([firstId, secondId, game.id]).size).toBe(3);
  });
});
