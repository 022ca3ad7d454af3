/**
 * Keeps the entries whose key starts with `prefix`, with the prefix stripped.
 * Without a prefix every entry is kept.
 */
export function selectPrefixed(
  values: Record<string, string | undefined>,
  prefix?: string,
): Record<string, string | undefined> {
  if (!prefix) return { ...values }

  const selected: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix) && key.length > prefix.length) {
      selected[key.slice(prefix.length)] = value
    }
  }

  return selected
}
