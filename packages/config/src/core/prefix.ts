/**
 * Keeps the entries whose key starts with `prefix`, with the prefix removed.
 * Entries whose value is `undefined` are dropped. An empty prefix keeps every
 * defined entry.
 */
export function stripPrefix(
  entries: Readonly<Record<string, string | undefined>>,
  prefix = "",
): Record<string, string> {
  const out: Record<string, string> = {}

  for (const [key, value] of Object.entries(entries)) {
    if (value === undefined || !key.startsWith(prefix)) continue
    const stripped = key.slice(prefix.length)
    if (stripped) out[stripped] = value
  }

  return out
}
