import type { KeyValueStore, StoreWrite } from "../../lib/kv";

/** In-process stand-in for Redis. */
export class MemoryStore implements KeyValueStore {
  readonly values = new Map<string, string>();
  private readonly sets = new Map<string, Set<string>>();
  private readonly lists = new Map<string, string[]>();

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  async incrBy(key: string, delta: number): Promise<number> {
    const next = Number(this.values.get(key) ?? "0") + delta;
    this.values.set(key, String(next));
    return next;
  }

  async del(key: string): Promise<void> {
    this.values.delete(key);
  }

  async transaction(writes: StoreWrite[]): Promise<void> {
    for (const write of writes) {
      if (write.op === "set") this.values.set(write.key, write.value);
      else if (write.op === "incrBy") this.values.set(write.key, String(Number(this.values.get(write.key) ?? "0") + write.delta));
      else this.values.delete(write.key);
    }
  }

  async sAdd(key: string, member: string): Promise<void> {
    const set = this.sets.get(key) ?? new Set<string>();
    set.add(member);
    this.sets.set(key, set);
  }

  async sMembers(key: string): Promise<string[]> {
    return Array.from(this.sets.get(key) ?? []);
  }

  async lPush(key: string, value: string, maxLen: number): Promise<void> {
    const list = [value, ...(this.lists.get(key) ?? [])];
    this.lists.set(key, list.slice(0, maxLen));
  }

  async lRange(key: string, count: number): Promise<string[]> {
    return (this.lists.get(key) ?? []).slice(0, count);
  }
}

type Failure = { kind: "read" | "write"; key: string };

/** MemoryStore that fails chosen calls once, the way a dropped Redis connection would. */
export class FlakyStore extends MemoryStore {
  private readonly failures: Failure[] = [];

  failNextRead(key: string) {
    this.failures.push({ kind: "read", key });
  }

  failNextWrite(key: string) {
    this.failures.push({ kind: "write", key });
  }

  async get(key: string): Promise<string | null> {
    this.trip("read", key);
    return super.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.trip("write", key);
    return super.set(key, value);
  }

  async incrBy(key: string, delta: number): Promise<number> {
    this.trip("write", key);
    return super.incrBy(key, delta);
  }

  async del(key: string): Promise<void> {
    this.trip("write", key);
    return super.del(key);
  }

  async transaction(writes: StoreWrite[]): Promise<void> {
    for (const write of writes) this.trip("write", write.key);
    return super.transaction(writes);
  }

  private trip(kind: Failure["kind"], key: string) {
    const index = this.failures.findIndex((f) => f.kind === kind && f.key === key);
    if (index === -1) return;
    this.failures.splice(index, 1);
    throw new Error(`store unavailable: ${kind} ${key}`);
  }
}
