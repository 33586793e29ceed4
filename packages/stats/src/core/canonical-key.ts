import superjson from "superjson"

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false
  const proto = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}

function sortKeys(value: unknown): unknown {
  if (Object.is(value, -0)) return 0
  if (Array.isArray(value)) return value.map(sortKeys)
  if (!isPlainObject(value)) return value

  return Object.fromEntries(
    Object.keys(value)
      .sort()
      .map((key) => [key, sortKeys(value[key])]),
  )
}

/**
 * A string equal for structurally equal values: same primitives, arrays in
 * the same order, plain objects with the same entries in any key order.
 * `-0` and `0` share a key.
 * Types superjson understands (Date, Map, Set, bigint, undefined) keep their
 * identity, so `1`, `"1"` and `1n` stay distinct.
 */
export function canonicalKey(value: unknown): string {
  return superjson.stringify(sortKeys(value))
}
