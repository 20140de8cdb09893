import {
  type CompareFn,
  type HashFn,
  HashTable,
  type HashTableOptions,
  createHashTable,
} from "./hash-table.js";
import { type Result, type Status, fail } from "./errors.js";
import type { OwnershipPolicy } from "./ownership.js";

export { HashTable, createHashTable } from "./hash-table.js";
export type {
  HashFn,
  CompareFn,
  Entry,
  HashTableOptions,
  TableState,
} from "./hash-table.js";

export { HashTableError } from "./errors.js";
export type { HashTableErrorKind, Result, Status } from "./errors.js";

export type { OwnershipPolicy } from "./ownership.js";

export { consoleLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export { hashInt, hashString, compareInt, compareString } from "./keys.js";

/**
 * Create a table with `capacity` buckets.
 * @param policy - Copy/free hooks; omit to have the table borrow keys and
 * values and never release them.
 * @returns The table, or an `InvalidArgument` / `AllocationFailure` error.
 */
export function create<K, V>(
  capacity: number,
  hash: HashFn<K>,
  compare: CompareFn<K>,
  policy?: OwnershipPolicy<K, V>,
  options?: HashTableOptions
): Result<HashTable<K, V>> {
  return createHashTable(capacity, hash, compare, policy, options);
}

/** Release every entry. The table must not be used afterwards. */
export function destroy<K, V>(table: HashTable<K, V>) {
  table.destroy();
}

type TableHandle<K, V> = HashTable<K, V> | null | undefined;

export function insert<K, V>(
  table: TableHandle<K, V>,
  key: K,
  value: V
): Status {
  if (!table) return fail("InvalidArgument", "insert without a table");
  return table.insert(key, value);
}

export function remove<K, V>(table: TableHandle<K, V>, key: K): Status {
  if (!table) return fail("InvalidArgument", "remove without a table");
  return table.remove(key);
}

/**
 * @returns The stored value, or `undefined` when `key` is absent.
 */
export function get<K, V>(table: HashTable<K, V>, key: K): V | undefined {
  return table.get(key);
}
