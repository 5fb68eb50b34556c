import { type Clock, SystemClock } from "@studydash/cache"
import { createPinoLogger, type Logger } from "@studydash/logger"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
  clock: Clock
}

export function createCoreServices(config: AppConfig): CoreServices {
  const clock = new SystemClock()

  const logger = createPinoLogger(
    {},
    {
      level: config.logging.level,
      prettify: config.logging.prettify,
    },
    { service: config.logging.serviceName, env: config.app.env },
  )

  return { clock, logger }
}
