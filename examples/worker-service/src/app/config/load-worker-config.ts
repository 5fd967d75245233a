import { type EnvRecord, InvalidValueError, load, sprint } from "@envtag/config"
import { isLogLevelName, type Logger } from "@envtag/logger"
import { createWorkerEnv, type WorkerConfig, type WorkerEnv, workerEnvSchema } from "./schema"

export function mapEnvToConfig(env: WorkerEnv): WorkerConfig {
  if (!isLogLevelName(env.logLevel)) {
    throw new InvalidValueError(`invalid log level '${env.logLevel}'`, "string", env.logLevel)
  }

  return {
    app: {
      env: env.appEnv,
    },
    logging: {
      level: env.logLevel,
      prettify: env.logPretty,
      serviceName: env.serviceName,
    },
    queue: {
      url: env.queueUrl,
      name: env.queueName,
      token: env.apiToken,
    },
    worker: {
      concurrency: env.concurrency,
      pollIntervalMs: env.pollInterval,
      shutdownTimeoutMs: env.shutdownTimeout,
      retryFactor: env.retryFactor,
    },
    allowedOrigins: env.allowedOrigins,
  }
}

export type LoadWorkerConfigOptions = {
  cwd?: string
  logger?: Logger
}

/**
 * With `APP_ENV` set, `.env.<APP_ENV>` must exist and is read. Otherwise a
 * `.env` is read when present. Variables in `env` win over both.
 */
export async function loadWorkerConfig(
  env: EnvRecord,
  options: LoadWorkerConfigOptions = {},
): Promise<WorkerConfig> {
  const appEnv = env.APP_ENV
  const envFiles = appEnv ? [`.env.${appEnv}`] : undefined

  const bound = await load(createWorkerEnv(), workerEnvSchema, {
    envFiles,
    env,
    cwd: options.cwd,
    logger: options.logger,
  })

  options.logger?.debug(sprint(bound, workerEnvSchema))

  return mapEnvToConfig(bound)
}
