/**
 * Flat variable map produced by a source. `undefined` means "not provided".
 */
export type EnvRecord = Record<string, string | undefined>

/**
 * A source of raw environment values.
 *
 * A ConfigSource only loads. It does not coerce, validate or merge.
 * When several sources are layered, later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "env", "dotenv:.env.local", "object:overrides"
   */
  readonly name: string

  load(): Promise<EnvRecord>
}
