function step(current: unknown, segment: string): unknown {
  if (current === null || current === undefined) return null;
  if (Array.isArray(current)) {
    if (!/^\d+$/.test(segment)) return null;
    return current[Number(segment)] ?? null;
  }
  if (typeof current !== 'object') return null;
  if (!Object.hasOwn(current, segment)) return null;
  return Reflect.get(current, segment) ?? null;
}

/**
 * Resolve a dotted attribute path (`site.region.name`) against an object.
 * Missing or null links anywhere along the path yield `null`.
 */
export function resolvePath(obj: unknown, path: string): unknown {
  const segments = path
    .split('.')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  if (segments.length === 0) return null;

  let current: unknown = obj;
  for (const segment of segments) {
    current = step(current, segment);
    if (current === null) return null;
  }
  return current;
}

export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim().length === 0;
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

/** First candidate path resolving to a non-empty value, as `{ path, value }`. */
export function resolveFirst(obj: unknown, paths: readonly string[]): { path: string; value: unknown } | null {
  for (const path of paths) {
    const value = resolvePath(obj, path);
    if (!isEmptyValue(value)) return { path, value };
  }
  return null;
}
