export type RawDeclaration = { kind: string; tag: string }

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * A declaration with a non-empty tag. The kind is checked later, when a
 * value is coerced.
 */
export function isTaggedDeclaration(value: unknown): value is RawDeclaration {
  return (
    isRecord(value) &&
    typeof value.kind === "string" &&
    typeof value.tag === "string" &&
    value.tag !== ""
  )
}

export function declarationEntries(schema: Record<string, unknown>): [string, RawDeclaration][] {
  const entries: [string, unknown][] = Object.entries(schema)
  const tagged: [string, RawDeclaration][] = []

  for (const [name, declaration] of entries) {
    if (isTaggedDeclaration(declaration)) tagged.push([name, declaration])
  }

  return tagged
}
