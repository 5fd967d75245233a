import type { Logger } from "@envtag/logger"
import type { EnvLookup } from "../../ports/field"
import type { ConfigSource, EnvRecord } from "../../ports/source"

export type EnvLookupOptions = {
  /** System layer. Defaults to `process.env`. */
  env?: EnvRecord
  /** Values read from files, consulted when the system layer is unset or empty. */
  overlay?: EnvRecord
  /** When false the system layer is skipped. Default: true */
  useSystem?: boolean
}

/**
 * Own string value of `name`, or `undefined`. Inherited properties such as
 * `constructor` are never read.
 */
export function readVariable(record: EnvRecord, name: string): string | undefined {
  if (!Object.hasOwn(record, name)) return undefined

  const value: unknown = record[name]
  return typeof value === "string" ? value : undefined
}

export function createEnvLookup(options: EnvLookupOptions = {}): EnvLookup {
  const env = options.env ?? process.env
  const overlay = options.overlay ?? {}
  const useSystem = options.useSystem ?? true

  return (name) => {
    const system = useSystem ? readVariable(env, name) : undefined
    if (system !== undefined && system !== "") return system

    const fromFile = readVariable(overlay, name)
    if (fromFile !== undefined && fromFile !== "") return fromFile

    return undefined
  }
}

/**
 * Loads `sources` in order and merges them. Later sources override earlier
 * ones; `undefined` values never override.
 */
export async function readOverlay(
  sources: readonly ConfigSource[],
  logger: Logger,
): Promise<EnvRecord> {
  const merged: EnvRecord = {}

  for (const source of sources) {
    const values = await source.load()
    let count = 0

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue
      merged[key] = value
      count++
    }

    logger.debug("config source loaded", { source: source.name, keys: count })
  }

  return merged
}
