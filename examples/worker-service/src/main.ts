import { toAppError } from "@envtag/errors"
import { createPinoLogger } from "@envtag/logger"
import { loadWorkerConfig } from "./app/config/load-worker-config"
import { createCoreServices } from "./app/services/core"

const bootstrap = createPinoLogger({}, { level: "info" }, { module: "bootstrap" })

async function main(): Promise<void> {
  const config = await loadWorkerConfig(process.env)
  const { logger } = createCoreServices(config)

  logger.info("worker configured", {
    queue: config.queue.name,
    concurrency: config.worker.concurrency,
    pollIntervalMs: config.worker.pollIntervalMs,
  })
}

main().catch((err: unknown) => {
  bootstrap.fatal("worker failed to start", { err: toAppError(err, "worker_start_failed") })
  process.exit(1)
})
