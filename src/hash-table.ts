import {
  type HashTableError,
  type Result,
  type Status,
  done,
  fail,
  ok,
} from "./errors.js";
import { type Logger, consoleLogger, debugFromEnv } from "./logger.js";
import {
  type OwnershipPolicy,
  type ResolvedOwnership,
  isPassthrough,
  resolveOwnership,
} from "./ownership.js";

/**
 * Must be a pure function of the key's content and return a non-negative
 * safe integer.
 */
export type HashFn<K> = (key: K) => number;

/**
 * Comparator-style equality: `0` or `false` means the keys are equal,
 * anything else means they are distinct.
 */
export type CompareFn<K> = (a: K, b: K) => number | boolean;

export type HashTableOptions = {
  logger?: Logger;
  /** Print through the console logger. Ignored when `logger` is given. */
  debug?: boolean;
};

export type TableState = "live" | "destroyed";

export interface Entry<K, V> {
  key: K;
  value: V;
}

type Bucket<K, V> = Entry<K, V>[];

const BAD_HASH = "hash is not a non-negative integer";

function keysEqual<K>(compare: CompareFn<K>, a: K, b: K) {
  const c = compare(a, b);
  return c === 0 || c === false;
}

/**
 * Fixed-capacity hash table with separate chaining. Construct it with
 * {@link createHashTable}; the constructor assumes validated arguments.
 */
export class HashTable<K, V> {
  readonly capacity: number;
  hash: HashFn<K>;
  compare: CompareFn<K>;
  ownership: ResolvedOwnership<K, V>;
  logger: Logger;

  private buckets: (Bucket<K, V> | undefined)[];
  private count = 0;
  private lifecycle: TableState = "live";

  /** @internal */
  constructor(
    buckets: (Bucket<K, V> | undefined)[],
    hash: HashFn<K>,
    compare: CompareFn<K>,
    ownership: ResolvedOwnership<K, V>,
    logger: Logger
  ) {
    this.buckets = buckets;
    this.capacity = buckets.length;
    this.hash = hash;
    this.compare = compare;
    this.ownership = ownership;
    this.logger = logger;
  }

  get size() {
    return this.count;
  }

  get state() {
    return this.lifecycle;
  }

  /**
   * @returns The bucket `key` addresses, or `undefined` when the hash
   * function returns something other than a non-negative safe integer.
   */
  bucketIndex(key: K) {
    const h = this.hash(key);
    if (!Number.isSafeInteger(h) || h < 0) return undefined;
    return h % this.capacity;
  }

  chainLength(index: number) {
    return this.buckets[index]?.length ?? 0;
  }

  /**
   * Store `value` under `key`. An existing equal key keeps its entry and
   * only has its value replaced.
   */
  insert(key: K, value: V): Status {
    if (this.lifecycle === "destroyed") {
      return this.reject("InvalidArgument", "insert on a destroyed table");
    }
    if (value === undefined || value === null) {
      return this.reject("InvalidArgument", "insert with a missing value");
    }

    const index = this.bucketIndex(key);
    if (index === undefined) {
      return this.reject("InvalidArgument", BAD_HASH);
    }

    const bucket = this.buckets[index];
    const existing = bucket?.find((e) => keysEqual(this.compare, e.key, key));

    if (existing) {
      const copied = this.copy(() => this.ownership.copyValue(value));
      if (!copied.ok) return copied;

      this.ownership.freeValue(existing.value);
      existing.value = copied.value;
      return done();
    }

    const copiedKey = this.copy(() => this.ownership.copyKey(key));
    if (!copiedKey.ok) return copiedKey;

    const copiedValue = this.copy(() => this.ownership.copyValue(value));
    if (!copiedValue.ok) {
      this.ownership.freeKey(copiedKey.value);
      return copiedValue;
    }

    const entry = { key: copiedKey.value, value: copiedValue.value };
    if (bucket) {
      bucket.push(entry);
    } else {
      this.buckets[index] = [entry];
    }
    this.count++;

    return done();
  }

  /** Unlink the entry for `key` and release its key and value. */
  remove(key: K): Status {
    if (this.lifecycle === "destroyed") {
      return this.reject("InvalidArgument", "remove on a destroyed table");
    }

    const index = this.bucketIndex(key);
    if (index === undefined) {
      return this.reject("InvalidArgument", BAD_HASH);
    }

    const bucket = this.buckets[index];
    const pos = bucket
      ? bucket.findIndex((e) => keysEqual(this.compare, e.key, key))
      : -1;

    if (!bucket || pos === -1) {
      return fail("NotFound", "key not present");
    }

    const [removed] = bucket.splice(pos, 1);
    if (bucket.length === 0) {
      this.buckets[index] = undefined;
    }
    this.count--;

    this.release(removed);

    return done();
  }

  /**
   * @returns The stored value for `key` (the live reference, not a copy),
   * or `undefined` if there is none.
   */
  get(key: K): V | undefined {
    if (this.lifecycle === "destroyed") {
      this.logger.error("get on a destroyed table");
      return undefined;
    }

    const index = this.bucketIndex(key);
    if (index === undefined) {
      this.logger.error(BAD_HASH);
      return undefined;
    }

    const bucket = this.buckets[index];
    return bucket?.find((e) => keysEqual(this.compare, e.key, key))?.value;
  }

  has(key: K) {
    return this.get(key) !== undefined;
  }

  /**
   * Release every entry through the ownership policy. The table accepts no
   * further operations afterwards.
   */
  destroy() {
    if (this.lifecycle === "destroyed") {
      this.logger.error("destroy on a destroyed table");
      return;
    }

    // entries are unreachable before any free hook runs
    const buckets = this.buckets;
    this.buckets = [];
    this.count = 0;
    this.lifecycle = "destroyed";

    for (const bucket of buckets) {
      if (!bucket) continue;
      for (const entry of bucket) {
        this.release(entry);
      }
    }

    this.logger.info(`destroyed table with ${this.capacity} buckets`);
  }

  /** Bucket order, then chain order. Not sorted in any way. */
  *entries(): IterableIterator<[K, V]> {
    for (const bucket of this.buckets) {
      if (!bucket) continue;
      for (const { key, value } of bucket) {
        yield [key, value];
      }
    }
  }

  *keys(): IterableIterator<K> {
    for (const [k] of this.entries()) yield k;
  }

  *values(): IterableIterator<V> {
    for (const [, v] of this.entries()) yield v;
  }

  [Symbol.iterator]() {
    return this.entries();
  }

  private release(entry: Entry<K, V>) {
    this.ownership.freeValue(entry.value);
    this.ownership.freeKey(entry.key);
  }

  // copy hooks allocate; a throw from one is an allocation failure
  private copy<T>(fn: () => T): Result<T> {
    try {
      return ok(fn());
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return this.reject("AllocationFailure", `copy failed: ${reason}`);
    }
  }

  private reject<T>(kind: HashTableError["kind"], message: string): Result<T> {
    this.logger.error(message);
    return fail(kind, message);
  }
}

/**
 * Create an empty table.
 * @param capacity - Number of buckets; fixed for the table's lifetime.
 * @param hash - Hash function for keys.
 * @param compare - Key comparison; `0`/`false` means equal.
 * @param policy - Ownership hooks. Omit to store keys and values by reference.
 * @param options - Logging configuration.
 */
export function createHashTable<K, V>(
  capacity: number,
  hash: HashFn<K>,
  compare: CompareFn<K>,
  policy?: OwnershipPolicy<K, V>,
  options: HashTableOptions = {}
): Result<HashTable<K, V>> {
  const logger =
    options.logger ?? consoleLogger(options.debug ?? debugFromEnv());

  if (!Number.isSafeInteger(capacity) || capacity < 1) {
    const message = `capacity must be a positive integer, got ${capacity}`;
    logger.error(message);
    return fail("InvalidArgument", message);
  }
  if (typeof hash !== "function" || typeof compare !== "function") {
    const message = "hash and compare functions are required";
    logger.error(message);
    return fail("InvalidArgument", message);
  }

  let buckets: (Bucket<K, V> | undefined)[];
  try {
    buckets = new Array<Bucket<K, V> | undefined>(capacity);
  } catch (err) {
    if (!(err instanceof RangeError)) throw err;
    const message = `could not allocate ${capacity} buckets`;
    logger.error(message);
    return fail("AllocationFailure", message);
  }

  const ownership = resolveOwnership(policy);
  logger.info(
    `created table with ${capacity} buckets (${
      isPassthrough(ownership) ? "passthrough" : "owning"
    })`
  );

  return ok(new HashTable(buckets, hash, compare, ownership, logger));
}
