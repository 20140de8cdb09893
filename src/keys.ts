// hash and comparison functions for the common key types

/** Identity hash for non-negative integers. */
export function hashInt(n: number) {
  return n >>> 0;
}

/**
 * djb2 with xor mixing, over UTF-16 code units.
 * @returns An unsigned 32-bit hash.
 */
export function hashString(s: string) {
  let hash = 5381;
  for (let i = 0; i < s.length; i++) {
    hash = (((hash << 5) + hash) ^ s.charCodeAt(i)) >>> 0;
  }
  return hash;
}

export function compareInt(a: number, b: number) {
  return a - b;
}

/** Code-unit order; 0 only when the strings are identical. */
export function compareString(a: string, b: string) {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
