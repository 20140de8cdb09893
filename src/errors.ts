export type HashTableErrorKind =
  | "InvalidArgument"
  | "AllocationFailure"
  | "NotFound";

/**
 * Error value handed back by table operations. It is returned inside a
 * {@link Result}, never thrown.
 */
export class HashTableError extends Error {
  kind: HashTableErrorKind;

  constructor(kind: HashTableErrorKind, message: string) {
    super(message);
    this.name = "HashTableError";
    this.kind = kind;
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: HashTableError };

export type Status = Result<void>;

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function done(): Status {
  return ok(undefined);
}

export function fail<T = void>(
  kind: HashTableErrorKind,
  message: string
): Result<T> {
  return { ok: false, error: new HashTableError(kind, message) };
}
