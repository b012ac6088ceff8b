import { KeyedLock } from "../keyed-lock";

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  it("runs tasks on the same key one after another", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.run("room", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = lock.run("room", async () => {
      order.push("second");
    });

    expect(lock.isLocked("room")).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first", "second"]);
    expect(lock.isLocked("room")).toBe(false);
  });

  it("lets different keys proceed independently", async () => {
    const lock = new KeyedLock();
    const gate = deferred();

    const waiting = lock.run("a", async () => {
      await gate.promise;
      return "a";
    });
    const other = lock.run("b", async () => {
      gate.resolve();
      return "b";
    });

    await expect(Promise.all([waiting, other])).resolves.toEqual(["a", "b"]);
  });

  it("keeps going after a task rejects", async () => {
    const lock = new KeyedLock();

    const failing = lock.run("room", async () => {
      throw new Error("boom");
    });
    const next = lock.run("room", async () => 42);

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe(42);
  });
});
