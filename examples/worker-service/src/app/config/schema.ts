import { field, type FieldSchema } from "@envtag/config"
import type { LogLevelName } from "@envtag/logger"

export interface WorkerEnv {
  appEnv: string
  serviceName: string

  logLevel: string
  logPretty: boolean

  queueUrl: string
  queueName: string
  apiToken: string

  concurrency: number
  pollInterval: number
  shutdownTimeout: number
  retryFactor: number

  allowedOrigins: string[]
}

export const workerEnvSchema: FieldSchema<WorkerEnv> = {
  appEnv: field.string("APP_ENV,development"),
  serviceName: field.string("SERVICE_NAME,worker-service"),

  logLevel: field.string("LOG_LEVEL,info"),
  logPretty: field.bool("LOG_PRETTY,false"),

  queueUrl: field.string("QUEUE_URL,required"),
  queueName: field.string("QUEUE_NAME,jobs"),
  apiToken: field.string("API_TOKEN,required"),

  concurrency: field.int("WORKER_CONCURRENCY,4"),
  pollInterval: field.duration("WORKER_POLL_INTERVAL,1s"),
  shutdownTimeout: field.duration("SHUTDOWN_TIMEOUT,10s"),
  retryFactor: field.float("RETRY_BACKOFF_FACTOR,2"),

  allowedOrigins: field.list("ALLOWED_ORIGINS,localhost"),
}

export function createWorkerEnv(): WorkerEnv {
  return {
    appEnv: "",
    serviceName: "",
    logLevel: "",
    logPretty: false,
    queueUrl: "",
    queueName: "",
    apiToken: "",
    concurrency: 0,
    pollInterval: 0,
    shutdownTimeout: 0,
    retryFactor: 0,
    allowedOrigins: [],
  }
}

export type WorkerConfig = {
  app: {
    env: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  queue: {
    url: string
    name: string
    token: string
  }

  worker: {
    concurrency: number
    pollIntervalMs: number
    shutdownTimeoutMs: number
    retryFactor: number
  }

  allowedOrigins: string[]
}
