/**
 * `null` and `undefined` both count as "no value given".
 */
export function isNil(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Plain mapping check: objects that are neither arrays nor class instances
 * such as Date or Map.
 */
export function isPlainObject(
  value: unknown
): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Structural equality for JSON-like values (primitives, arrays, plain objects).
 *
 * @param a
 * @param b
 * @returns
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;

  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((v, i) => deepEqual(v, b[i]));
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;

    return keys.every((key) => key in b && deepEqual(a[key], b[key]));
  }

  return false;
}

/**
 * Literal rendering used in error messages, e.g. `[1, "a", null]`.
 *
 * @param value
 * @returns
 */
export function inspectValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (value === null) return "null";
  if (value === undefined) return "undefined";

  if (Array.isArray(value)) {
    return `[${value.map(inspectValue).join(", ")}]`;
  }

  if (isPlainObject(value)) {
    const pairs = Object.entries(value).map(
      ([key, v]) => `${JSON.stringify(key)}: ${inspectValue(v)}`
    );
    return `{${pairs.join(", ")}}`;
  }

  return String(value);
}
