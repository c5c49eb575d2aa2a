export type CompactRecord<T, K extends keyof T = keyof T> = {
  [P in K]?: Exclude<T[P], null | undefined>;
};

/** `null`, `undefined`, `''` and `[]` are empty. `false` and `0` are values. */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) {
    return true;
  }
  if (typeof value === 'string' || Array.isArray(value)) {
    return value.length === 0;
  }
  return false;
}

export function isPresent<V>(value: V): value is Exclude<V, null | undefined> {
  return !isEmptyValue(value);
}

/**
 * Copies the non-empty fields of `draft` into a new object, in the order given
 * by `order`. Fields missing from `order` are dropped.
 */
export function compactRecord<T extends object, K extends keyof T>(
  draft: T,
  order: readonly K[],
): CompactRecord<T, K> {
  const record: CompactRecord<T, K> = {};
  for (const field of order) {
    const value = draft[field];
    if (isPresent(value)) {
      record[field] = value;
    }
  }
  return record;
}

/**
 * Falls back to the batch-level value only when the record omits the field.
 * An explicit `null` or `''` is kept and left for pruning.
 */
export function inheritFromMeta<V>(value: V | undefined, fallback: V | undefined): V | undefined {
  return value === undefined ? fallback : value;
}
