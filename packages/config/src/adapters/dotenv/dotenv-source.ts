import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { ConfigSource, EnvRecord } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.production", "./config/.env"
   */
  file: string

  /**
   * Whether the file must exist. When false a missing file loads as `{}`.
   */
  required: boolean

  /**
   * Base directory for relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  get path(): string {
    return path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)
  }

  async load(): Promise<EnvRecord> {
    try {
      const content = await fs.readFile(this.path, "utf-8")

      return parse(content)
    } catch (err) {
      if (!this.opts.required && isNotFound(err)) {
        return {}
      }
      throw err
    }
  }
}
