import {
  type ConfigParser,
  type ConfigRecord,
  EnvConfigParser,
  JsonConfigParser,
} from "@crm-link/config"
import { isAppError } from "@crm-link/errors"
import type { Logger } from "@crm-link/logger"

export type ConnectionConfigSource =
  | { kind: "env"; env?: Record<string, string | undefined> }
  | { kind: "file"; file: string; cwd?: string }

export function createConfigParser(
  source: ConnectionConfigSource,
  logger: Logger,
): ConfigParser {
  switch (source.kind) {
    case "env":
      return new EnvConfigParser({ ...(source.env && { env: source.env }), logger })
    case "file":
      return new JsonConfigParser(source.file, {
        ...(source.cwd !== undefined && { cwd: source.cwd }),
        logger,
      })
  }
}

export function loadConnectionConfig(
  source: ConnectionConfigSource,
  logger: Logger,
): ConfigRecord {
  return createConfigParser(source, logger).parseConfig()
}

/**
 * Loads the connection settings from the file named by the first argument,
 * or from the environment when there is none. Returns the exit code.
 */
export function run(args: readonly string[], env: NodeJS.ProcessEnv, logger: Logger): number {
  const file = args[0]
  const source: ConnectionConfigSource =
    file === undefined ? { kind: "env", env } : { kind: "file", file }

  try {
    const config = loadConnectionConfig(source, logger)

    logger.info("connection configured", {
      url: config.url,
      customModules: config.customModules.map((module) => module.name ?? "(unnamed)"),
    })

    return 0
  } catch (err) {
    if (!isAppError(err)) throw err

    logger.error("could not load connection configuration", { err })

    return 1
  }
}
