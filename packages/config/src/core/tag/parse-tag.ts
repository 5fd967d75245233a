export type TagFallback =
  | { kind: "none" }
  | { kind: "required" }
  | { kind: "default"; value: string }

export type ParsedTag = Readonly<{
  variable: string
  fallback: TagFallback
}>

const REQUIRED = "required"

/**
 * Splits a tag on its first comma. Everything after that comma, further
 * commas included, is the second part.
 *
 * @example
 * splitTag("PORT")                      // ["PORT"]
 * splitTag("HOSTS,localhost,127.0.0.1") // ["HOSTS", "localhost,127.0.0.1"]
 */
export function splitTag(tag: string): [string] | [string, string] {
  const comma = tag.indexOf(",")
  if (comma === -1) return [tag]

  return [tag.slice(0, comma), tag.slice(comma + 1)]
}

export function parseTag(tag: string): ParsedTag {
  const [variable, tail] = splitTag(tag)

  if (tail === undefined) return { variable, fallback: { kind: "none" } }
  if (tail === REQUIRED) return { variable, fallback: { kind: "required" } }

  return { variable, fallback: { kind: "default", value: tail } }
}
