import { createPinoLogger } from "@crm-link/logger"
import { run } from "./load-connection-config"

const logger = createPinoLogger(
  {},
  { level: "info", prettify: process.env.LOG_PRETTY === "true" },
  { service: "crm-connection" },
)

process.exitCode = run(process.argv.slice(2), process.env, logger)
