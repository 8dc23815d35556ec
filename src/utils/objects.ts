/**
 * Copy the listed keys from a partial update onto a target, skipping keys
 * whose value is undefined
 */
export function assignDefined<T, K extends keyof T>(
  target: T,
  changes: Partial<Pick<T, K>>,
  keys: readonly K[]
): T {
  for (const key of keys) {
    const value = changes[key];
    if (value !== undefined) {
      target[key] = value;
    }
  }
  return target;
}
