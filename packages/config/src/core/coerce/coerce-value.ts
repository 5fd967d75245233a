import { type FieldKind, fieldKinds } from "../../ports/field"
import { UnsupportedFieldTypeError } from "../errors"
import { parseBool } from "./parse-bool"
import { parseDuration } from "./parse-duration"
import { parseList } from "./parse-list"
import { parseFloatValue, parseInteger } from "./parse-number"

export type CoercedValue = string | number | boolean | string[]

export function isFieldKind(kind: string): kind is FieldKind {
  return fieldKinds.some((known) => known === kind)
}

/**
 * Converts a raw string to the value for a field of `kind`.
 *
 * @throws {InvalidValueError} when `raw` is not valid for `kind`
 * @throws {UnsupportedFieldTypeError} when `kind` is not a known field kind
 */
export function coerceValue(kind: string, raw: string): CoercedValue {
  if (!isFieldKind(kind)) throw new UnsupportedFieldTypeError(kind)

  switch (kind) {
    case "duration":
      return parseDuration(raw)
    case "string":
      return raw
    case "int":
      return parseInteger(raw)
    case "bool":
      return parseBool(raw)
    case "float":
      return parseFloatValue(raw)
    case "list":
      return parseList(raw)
  }
}
