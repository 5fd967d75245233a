import { createPinoLogger, type Logger } from "@envtag/logger"
import type { WorkerConfig } from "../config/schema"

export type CoreServices = {
  logger: Logger
}

export function createCoreServices(config: WorkerConfig): CoreServices {
  const logger = createPinoLogger(
    {},
    {
      level: config.logging.level,
      prettify: config.logging.prettify,
    },
    { service: config.logging.serviceName, env: config.app.env },
  )

  return { logger }
}
