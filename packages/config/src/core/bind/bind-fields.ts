import type { BindReport, EnvLookup, FieldSchema } from "../../ports/field"
import { coerceValue } from "../coerce/coerce-value"
import { ConfigTargetError, FieldCoercionError, RequiredFieldsError } from "../errors"
import { parseTag } from "../tag/parse-tag"
import { declarationEntries, isRecord } from "./declarations"
import { readVariable } from "./env-lookup"

export type BindOptions = {
  /**
   * Where variables are read from. Defaults to `process.env`.
   * A lookup that always returns `undefined` binds defaults only.
   */
  lookup?: EnvLookup
}

function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  return typeof value
}

const processEnvLookup: EnvLookup = (name) => readVariable(process.env, name)

function isSettable(record: Record<string, unknown>, name: string): boolean {
  const descriptor = Object.getOwnPropertyDescriptor(record, name)
  if (!descriptor) return Object.isExtensible(record)

  return descriptor.writable === true || descriptor.set !== undefined
}

/**
 * Binds every declared field of `target` from the environment, in
 * declaration order.
 *
 * A non-empty variable wins over the tag default. A field with neither is
 * left untouched, unless its tag is marked `required`, in which case the
 * pass carries on and a single {@link RequiredFieldsError} listing every
 * missing variable is thrown at the end. A value that cannot be coerced
 * throws {@link FieldCoercionError} straight away.
 */
export function bindFields<T extends object>(
  target: T,
  schema: FieldSchema<T>,
  options: BindOptions = {},
): BindReport {
  const record: unknown = target
  if (!isRecord(record)) throw new ConfigTargetError(describeValue(record))

  const declarations: unknown = schema
  if (!isRecord(declarations)) throw new ConfigTargetError(`${describeValue(declarations)} schema`)

  const tagged = declarationEntries(declarations)

  for (const [name] of tagged) {
    if (!isSettable(record, name)) throw new ConfigTargetError(`read-only field ${name}`)
  }

  const lookup = options.lookup ?? processEnvLookup
  const report: BindReport = { sources: {}, unresolved: [] }
  const missing: string[] = []

  for (const [name, declaration] of tagged) {
    const { variable, fallback } = parseTag(declaration.tag)

    let raw = lookup(variable) ?? ""
    let origin: "env" | "default" = "env"

    if (raw === "") {
      if (fallback.kind === "required") {
        missing.push(variable)
        continue
      }

      if (fallback.kind === "none" || fallback.value === "") {
        report.unresolved.push(name)
        continue
      }

      raw = fallback.value
      origin = "default"
    }

    try {
      record[name] = coerceValue(declaration.kind, raw)
    } catch (err) {
      throw new FieldCoercionError(
        { field: name, variable, kind: declaration.kind, value: raw },
        err,
      )
    }

    report.sources[name] = origin
  }

  if (missing.length > 0) throw new RequiredFieldsError(missing)

  return report
}
