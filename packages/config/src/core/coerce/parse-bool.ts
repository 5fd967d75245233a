import { InvalidValueError } from "../errors"

const TRUE_VALUES = new Set(["true", "1", "yes", "on", "t"])
const FALSE_VALUES = new Set(["false", "0", "no", "off", "f", ""])

export function parseBool(raw: string): boolean {
  const normalized = raw.toLowerCase()

  if (TRUE_VALUES.has(normalized)) return true
  if (FALSE_VALUES.has(normalized)) return false

  throw new InvalidValueError(`invalid boolean value '${raw}'`, "bool", raw)
}
