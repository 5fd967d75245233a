import fs from "node:fs/promises"
import path from "node:path"
import { toAppError } from "@envtag/errors"
import { createNullLogger, type Logger } from "@envtag/logger"
import { DotenvSource } from "../adapters/dotenv/dotenv-source"
import { EnvSource } from "../adapters/env/env-source"
import type { FieldSchema } from "../ports/field"
import type { ConfigSource, EnvRecord } from "../ports/source"
import { bindFields } from "./bind/bind-fields"
import { createEnvLookup, readOverlay } from "./bind/env-lookup"
import { EnvFileError } from "./errors"
import { type LoadOptions, validateLoadOptions } from "./load-options"

export type SourceLoadOptions = Omit<LoadOptions, "envFiles">

/** Probed in order by {@link findAndLoad}, followed by `$ENV_FILE`. */
export const ENV_FILE_CANDIDATES = [
  ".env",
  "./.env",
  "../.env",
  "../../.env",
  "./config/.env",
  "./env/.env",
] as const

const DEFAULT_ENV_FILE = ".env"

type Resolved = {
  useSystem: boolean
  cwd: string
  env: EnvRecord
  sources: readonly ConfigSource[]
  logger: Logger
}

function resolve(options: LoadOptions): Resolved {
  validateLoadOptions(options)

  return {
    useSystem: options.useSystem ?? true,
    cwd: options.cwd ?? process.cwd(),
    env: options.env ?? process.env,
    sources: options.sources ?? [],
    logger: options.logger ?? createNullLogger(),
  }
}

async function bind<T extends object>(
  target: T,
  schema: FieldSchema<T>,
  files: EnvRecord,
  opts: Resolved,
): Promise<T> {
  const extra = opts.sources.length > 0 ? await readOverlay(opts.sources, opts.logger) : {}
  const overlay = { ...files, ...extra }

  const system = await new EnvSource({ env: opts.env }).load()
  const lookup = createEnvLookup({ env: system, overlay, useSystem: opts.useSystem })

  const report = bindFields(target, schema, { lookup })

  opts.logger.debug("config bound", {
    module: "config",
    sources: report.sources,
    unresolved: report.unresolved,
  })

  return target
}

async function readRequired(
  files: readonly string[],
  opts: Resolved,
  label: "file" | "files",
): Promise<EnvRecord> {
  const sources = files.map((file) => new DotenvSource({ file, required: true, cwd: opts.cwd }))

  try {
    return await readOverlay(sources, opts.logger)
  } catch (err) {
    throw new EnvFileError(files, err, label)
  }
}

async function readOptional(file: string, opts: Resolved): Promise<EnvRecord> {
  try {
    return await readOverlay(
      [new DotenvSource({ file, required: false, cwd: opts.cwd })],
      opts.logger,
    )
  } catch (err) {
    opts.logger.warn("env file could not be read, continuing without it", { file, err })
    return {}
  }
}

async function exists(file: string): Promise<boolean> {
  return fs.stat(file).then(
    () => true,
    () => false,
  )
}

/**
 * Binds `target` from the environment and `.env` files.
 *
 * With `envFiles`, every file must load or the promise rejects with
 * {@link EnvFileError}. Without it, a `.env` in `cwd` is read if present.
 *
 * @example
 * ```ts
 * const cfg = await load(emptyServerConfig(), serverSchema, {
 *   envFiles: [".env", ".env.local"],
 * })
 * ```
 */
export async function load<T extends object>(
  target: T,
  schema: FieldSchema<T>,
  options: LoadOptions = {},
): Promise<T> {
  const opts = resolve(options)
  const files = options.envFiles ?? []

  const overlay =
    files.length > 0
      ? await readRequired(files, opts, "files")
      : await readOptional(DEFAULT_ENV_FILE, opts)

  return bind(target, schema, overlay, opts)
}

/** Binds from the environment alone; no file is read. */
export async function loadFromEnv<T extends object>(
  target: T,
  schema: FieldSchema<T>,
  options: SourceLoadOptions = {},
): Promise<T> {
  return bind(target, schema, {}, resolve(options))
}

export async function loadFromFile<T extends object>(
  target: T,
  schema: FieldSchema<T>,
  file: string,
  options: SourceLoadOptions = {},
): Promise<T> {
  const opts = resolve(options)
  const overlay = await readRequired([file], opts, "file")

  return bind(target, schema, overlay, opts)
}

/**
 * Like {@link loadFromFile} for several files; later files override earlier
 * ones. An empty list reads `.env`, which must then exist.
 */
export async function loadFromFiles<T extends object>(
  target: T,
  schema: FieldSchema<T>,
  files: readonly string[],
  options: SourceLoadOptions = {},
): Promise<T> {
  const opts = resolve(options)
  const overlay = await readRequired(files.length > 0 ? files : [DEFAULT_ENV_FILE], opts, "files")

  return bind(target, schema, overlay, opts)
}

/**
 * Loads the first conventional `.env` location that exists and parses, then
 * binds. Binds from the environment alone when none does.
 */
export async function findAndLoad<T extends object>(
  target: T,
  schema: FieldSchema<T>,
  options: SourceLoadOptions = {},
): Promise<T> {
  const opts = resolve(options)
  const candidates = [...ENV_FILE_CANDIDATES, opts.env.ENV_FILE ?? ""].filter((c) => c !== "")

  let overlay: EnvRecord = {}

  for (const candidate of candidates) {
    const source = new DotenvSource({ file: candidate, required: true, cwd: opts.cwd })
    if (!(await exists(source.path))) continue

    try {
      overlay = await readOverlay([source], opts.logger)
      break
    } catch (err) {
      opts.logger.debug("env file skipped", { file: candidate, err })
    }
  }

  return bind(target, schema, overlay, opts)
}

/**
 * {@link load}, exiting the process with status 1 when it fails. The
 * failure is logged at fatal level first.
 */
export async function mustLoad<T extends object>(
  target: T,
  schema: FieldSchema<T>,
  options: LoadOptions = {},
): Promise<T> {
  try {
    return await load(target, schema, options)
  } catch (err) {
    const logger = options.logger ?? createNullLogger()
    logger.fatal("configuration could not be loaded", {
      err: toAppError(err, "config_load_failed"),
    })
    process.exit(1)
  }
}
