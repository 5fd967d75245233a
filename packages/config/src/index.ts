export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export { type BindOptions, bindFields } from "./core/bind/bind-fields"
export { createEnvLookup, type EnvLookupOptions, readOverlay } from "./core/bind/env-lookup"
export { type CoercedValue, coerceValue, isFieldKind } from "./core/coerce/coerce-value"
export { parseBool } from "./core/coerce/parse-bool"
export { formatDuration, parseDuration } from "./core/coerce/parse-duration"
export { parseList } from "./core/coerce/parse-list"
export { parseFloatValue, parseInteger } from "./core/coerce/parse-number"
export {
  type ConfigErrorCode,
  ConfigTargetError,
  EnvFileError,
  type FieldCoercionDetails,
  FieldCoercionError,
  InvalidValueError,
  isConfigError,
  LoadOptionsError,
  type OptionIssue,
  RequiredFieldsError,
  UnsupportedFieldTypeError,
} from "./core/errors"
export { field } from "./core/field"
export {
  ENV_FILE_CANDIDATES,
  findAndLoad,
  load,
  loadFromEnv,
  loadFromFile,
  loadFromFiles,
  mustLoad,
  type SourceLoadOptions,
} from "./core/load"
export { type LoadOptions, validateLoadOptions } from "./core/load-options"
export { MASK, shouldMaskField, sprint } from "./core/present/sprint"
export { type ParsedTag, parseTag, splitTag, type TagFallback } from "./core/tag/parse-tag"
export type {
  BindReport,
  EnvLookup,
  FieldDeclaration,
  FieldKind,
  FieldOrigin,
  FieldSchema,
  KindFor,
} from "./ports/field"
export { fieldKinds } from "./ports/field"
export type { ConfigSource, EnvRecord } from "./ports/source"
