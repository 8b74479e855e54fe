/**
 * Narrowing helpers for values of unknown shape (JSON bodies, thrown values).
 */

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Walk a path of keys and indexes through parsed JSON
 *
 * @example
 * ```typescript
 * readPath(body, ["choices", 0, "message", "content"]);
 * ```
 */
export const readPath = (
  value: unknown,
  path: ReadonlyArray<string | number>
): unknown => {
  let current: unknown = value;
  for (const key of path) {
    if (typeof key === "number") {
      if (!Array.isArray(current)) return undefined;
      current = current[key];
    } else {
      if (!isRecord(current)) return undefined;
      current = current[key];
    }
  }
  return current;
};

export const readString = (
  value: unknown,
  path: ReadonlyArray<string | number>
): string | undefined => {
  const found = readPath(value, path);
  return typeof found === "string" ? found : undefined;
};

export const readNumber = (
  value: unknown,
  path: ReadonlyArray<string | number>
): number | undefined => {
  const found = readPath(value, path);
  return typeof found === "number" && Number.isFinite(found) ? found : undefined;
};
