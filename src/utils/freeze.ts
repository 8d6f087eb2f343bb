/** Freeze `value` and everything reachable from it. */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return value;
  Object.freeze(value);
  for (const child of Object.values(value)) deepFreeze(child);
  return value;
}

/** Frozen deep copy; later changes to `value` do not reach it. */
export function frozenCopy<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}
