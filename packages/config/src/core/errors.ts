import { type AppError, BaseError, isAppError } from "@envtag/errors"

export type ConfigErrorCode =
  | "config_target_invalid"
  | "config_required_missing"
  | "config_coercion_failed"
  | "config_env_file_failed"
  | "config_options_invalid"

export class ConfigTargetError extends BaseError<"config_target_invalid"> {
  constructor(received: string) {
    super(`config target must be a settable object, received ${received}`, {
      code: "config_target_invalid",
      context: { received },
    })
  }
}

/**
 * Every required variable that was unset in one binding pass.
 */
export class RequiredFieldsError extends BaseError<"config_required_missing"> {
  readonly variables: readonly string[]

  constructor(variables: readonly string[]) {
    super(`validation errors: ${variables.map((v) => `${v} is required`).join("; ")}`, {
      code: "config_required_missing",
      context: { variables: [...variables] },
    })
    this.variables = variables
  }
}

export type FieldCoercionDetails = Readonly<{
  field: string
  variable: string
  kind: string
  value: string
}>

export class FieldCoercionError extends BaseError<"config_coercion_failed"> {
  constructor(details: FieldCoercionDetails, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)

    super(`error setting field ${details.field}: ${reason}`, {
      code: "config_coercion_failed",
      context: { ...details },
      cause,
    })
  }
}

export class InvalidValueError extends BaseError<"invalid_value"> {
  constructor(message: string, kind: string, value: string) {
    super(message, { code: "invalid_value", context: { kind, value } })
  }
}

export class UnsupportedFieldTypeError extends BaseError<"unsupported_field_type"> {
  constructor(kind: string) {
    super(`unsupported field type: ${kind}`, {
      code: "unsupported_field_type",
      context: { kind },
    })
  }
}

export class EnvFileError extends BaseError<"config_env_file_failed"> {
  constructor(files: readonly string[], cause: unknown, label: "file" | "files" = "files") {
    const reason = cause instanceof Error ? cause.message : String(cause)

    super(`error loading .env ${label}: ${reason}`, {
      code: "config_env_file_failed",
      context: { files: [...files] },
      cause,
    })
  }
}

export type OptionIssue = { path: string; message: string }

export class LoadOptionsError extends BaseError<"config_options_invalid"> {
  constructor(issues: readonly OptionIssue[]) {
    const first = issues[0]
    const detail = first ? `${first.path}: ${first.message}` : "invalid input"

    super(`invalid load options: ${detail}`, {
      code: "config_options_invalid",
      context: { issues: [...issues] },
    })
  }
}

const CONFIG_ERROR_CODES: ReadonlySet<string> = new Set<ConfigErrorCode>([
  "config_target_invalid",
  "config_required_missing",
  "config_coercion_failed",
  "config_env_file_failed",
  "config_options_invalid",
])

/** Matches any {@link AppError} carrying one of the loader's codes. */
export function isConfigError(
  err: unknown,
): err is AppError & { readonly code: ConfigErrorCode } {
  return isAppError(err) && CONFIG_ERROR_CODES.has(err.code)
}
