import type { FieldSchema } from "../../ports/field"
import { declarationEntries, isRecord } from "../bind/declarations"
import { formatDuration } from "../coerce/parse-duration"
import { parseTag } from "../tag/parse-tag"

export const MASK = "***MASKED***"

const SENSITIVE_KEYWORDS = [
  "password",
  "secret",
  "key",
  "token",
  "credential",
  "auth",
  "pass",
  "pwd",
  "access",
  "private",
] as const

const NAME_WIDTH = 20

export function shouldMaskField(name: string): boolean {
  const lower = name.toLowerCase()
  return SENSITIVE_KEYWORDS.some((keyword) => lower.includes(keyword))
}

function render(kind: string, value: unknown): string {
  if (value === undefined || value === null) return ""
  if (Array.isArray(value)) return `[${value.map(String).join(", ")}]`
  if (kind === "duration" && typeof value === "number") return formatDuration(value)
  return String(value)
}

/**
 * Human-readable dump of a bound record, one `VAR: value` line per tagged
 * field. Values of sensitive fields are replaced with {@link MASK}.
 */
export function sprint<T extends object>(record: T, schema: FieldSchema<T>): string {
  const values: unknown = record
  const declarations: unknown = schema
  const lines = ["Environment Configuration:", "=========================="]

  if (!isRecord(values) || !isRecord(declarations)) return lines.join("\n")

  for (const [name, { kind, tag }] of declarationEntries(declarations)) {
    const { variable } = parseTag(tag)
    const shown =
      shouldMaskField(name) || shouldMaskField(variable) ? MASK : render(kind, values[name])

    lines.push(`${variable.padEnd(NAME_WIDTH)}: ${shown}`)
  }

  return lines.join("\n")
}
