/**
 * Hooks deciding who owns stored keys and values. Every hook is optional;
 * a missing one behaves as passthrough (identity for copies, no-op for
 * frees).
 */
export type OwnershipPolicy<K, V> = {
  copyKey?: (key: K) => K;
  copyValue?: (value: V) => V;
  freeKey?: (key: K) => void;
  freeValue?: (value: V) => void;
};

export type ResolvedOwnership<K, V> = Required<OwnershipPolicy<K, V>>;

const identity = <T>(x: T) => x;
const noop = () => {};

/**
 * Fill in the passthrough default for each hook the caller left out.
 * @param policy - Caller policy; omitted entirely means the table borrows
 * keys and values and never frees them.
 */
export function resolveOwnership<K, V>(
  policy?: OwnershipPolicy<K, V>
): ResolvedOwnership<K, V> {
  return {
    copyKey: policy?.copyKey ?? identity,
    copyValue: policy?.copyValue ?? identity,
    freeKey: policy?.freeKey ?? noop,
    freeValue: policy?.freeValue ?? noop,
  };
}

export function isPassthrough<K, V>(policy: ResolvedOwnership<K, V>) {
  return (
    policy.copyKey === identity &&
    policy.copyValue === identity &&
    policy.freeKey === noop &&
    policy.freeValue === noop
  );
}
