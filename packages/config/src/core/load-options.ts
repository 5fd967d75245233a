import type { Logger } from "@envtag/logger"
import { z } from "zod/mini"
import type { ConfigSource, EnvRecord } from "../ports/source"
import { LoadOptionsError, type OptionIssue } from "./errors"

export type LoadOptions = {
  /** Files to read. Every listed file must exist and parse. Later files win. */
  envFiles?: readonly string[]
  /** Consult the process environment. Default: true */
  useSystem?: boolean
  /** Base directory for relative file paths. Default: `process.cwd()` */
  cwd?: string
  /** Stands in for `process.env`. */
  env?: EnvRecord
  /**
   * Extra sources read after the files, in order. They override file values
   * and are overridden by the process environment.
   */
  sources?: readonly ConfigSource[]
  logger?: Logger
}

const loadOptionsSchema = z.object({
  envFiles: z.optional(z.array(z.string())),
  useSystem: z.optional(z.boolean()),
  cwd: z.optional(z.string()),
})

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

/**
 * Checks the data part of {@link LoadOptions}. `env`, `sources` and
 * `logger` are passed through unchecked.
 *
 * @throws {LoadOptionsError}
 */
export function validateLoadOptions(options: LoadOptions): void {
  const result = loadOptionsSchema.safeParse({
    envFiles: options.envFiles,
    useSystem: options.useSystem,
    cwd: options.cwd,
  })

  if (result.success) return

  const issues: OptionIssue[] = result.error.issues.map((issue) => ({
    path: formatPath(issue.path),
    message: issue.message,
  }))

  throw new LoadOptionsError(issues)
}
