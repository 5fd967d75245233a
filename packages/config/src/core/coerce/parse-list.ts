/**
 * Comma-separated list. Items are trimmed and empty items dropped.
 */
export function parseList(raw: string): string[] {
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "")
}
