import type { ConfigSource, EnvRecord } from "../../ports/source"

export type EnvSourceOptions = {
  /** Defaults to `process.env`. */
  env?: EnvRecord
}

/** The process environment as a source. */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly env: EnvRecord

  constructor(options: EnvSourceOptions = {}) {
    this.env = options.env ?? process.env
  }

  async load(): Promise<EnvRecord> {
    return { ...this.env }
  }
}
