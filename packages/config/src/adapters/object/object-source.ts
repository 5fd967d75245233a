import type { ConfigSource, EnvRecord } from "../../ports/source"

/**
 * Fixed values supplied in code, typically overrides or test fixtures.
 */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly values: EnvRecord,
    readonly name: string = "object:overrides",
  ) {}

  async load(): Promise<EnvRecord> {
    return { ...this.values }
  }
}
