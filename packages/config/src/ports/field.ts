export const fieldKinds = ["string", "int", "bool", "float", "list", "duration"] as const

export type FieldKind = (typeof fieldKinds)[number]

/**
 * Declares how one field of a record is bound.
 *
 * `tag` has the form `VAR`, `VAR,required` or `VAR,<default>`. Only the
 * first comma splits, so `HOSTS,a,b` defaults to `"a,b"`.
 */
export type FieldDeclaration<K extends FieldKind = FieldKind> = Readonly<{
  kind: K
  tag: string
}>

/**
 * Field kinds allowed for a value type. Durations are numbers in milliseconds.
 */
export type KindFor<V> = V extends string
  ? "string"
  : V extends boolean
    ? "bool"
    : V extends number
      ? "int" | "float" | "duration"
      : V extends readonly string[]
        ? "list"
        : never

/**
 * Declaration table for a record type. Fields without an entry are never
 * touched by the binder or shown by the presenter.
 *
 * @example
 * ```ts
 * interface ServerConfig {
 *   port: number
 *   dbPassword: string
 *   allowedHosts: string[]
 * }
 *
 * const schema: FieldSchema<ServerConfig> = {
 *   port: field.int("PORT,8080"),
 *   dbPassword: field.string("DB_PASSWORD,required"),
 *   allowedHosts: field.list("ALLOWED_HOSTS,localhost,127.0.0.1"),
 * }
 * ```
 */
export type FieldSchema<T> = {
  readonly [K in keyof T]?: FieldDeclaration<KindFor<NonNullable<T[K]>>>
}

export type FieldOrigin = "env" | "default"

/**
 * What one binding pass did with each declared field.
 */
export type BindReport = {
  /** Fields that were assigned, keyed by field name. */
  sources: Record<string, FieldOrigin>
  /** Fields left untouched: no value and no usable default. */
  unresolved: string[]
}

/**
 * Reads one variable. `undefined` and `""` both mean "not set".
 */
export type EnvLookup = (name: string) => string | undefined
