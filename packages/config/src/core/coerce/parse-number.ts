import { InvalidValueError } from "../errors"

const INTEGER = /^[+-]?\d+$/
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/
const INFINITY = /^([+-]?)(?:inf|infinity)$/i
const NAN = /^nan$/i

export function parseInteger(raw: string): number {
  if (!INTEGER.test(raw)) {
    throw new InvalidValueError(`invalid integer value '${raw}'`, "int", raw)
  }

  const value = Number(raw)
  if (!Number.isSafeInteger(value)) {
    throw new InvalidValueError(
      `invalid integer value '${raw}': value out of range`,
      "int",
      raw,
    )
  }

  // -0 binds as 0
  return value === 0 ? 0 : value
}

export function parseFloatValue(raw: string): number {
  const infinity = INFINITY.exec(raw)
  if (infinity) return infinity[1] === "-" ? -Infinity : Infinity
  if (NAN.test(raw)) return Number.NaN

  if (!DECIMAL.test(raw)) {
    throw new InvalidValueError(`invalid float value '${raw}'`, "float", raw)
  }

  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new InvalidValueError(`invalid float value '${raw}': value out of range`, "float", raw)
  }

  return value
}
