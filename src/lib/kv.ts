export type StoreWrite =
  | { op: "set"; key: string; value: string }
  | { op: "incrBy"; key: string; delta: number }
  | { op: "del"; key: string };

/**
 * The slice of Redis the services rely on. Production uses RedisStore,
 * tests use an in-memory map.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  incrBy(key: string, delta: number): Promise<number>;
  del(key: string): Promise<void>;
  /** Applies every write or none of them. */
  transaction(writes: StoreWrite[]): Promise<void>;
  sAdd(key: string, member: string): Promise<void>;
  sMembers(key: string): Promise<string[]>;
  /** Prepends and keeps at most `maxLen` newest entries. */
  lPush(key: string, value: string, maxLen: number): Promise<void>;
  /** Newest first. */
  lRange(key: string, count: number): Promise<string[]>;
}
