import { createNullLogger, type Logger } from "@crm-link/logger"
import type { ConfigParser } from "../../ports/config-parser"
import type { ConfigRecord } from "../../ports/config-record"
import { ConfigError } from "../../core/errors/config-error"
import { createConfigRecord } from "../../core/record/config-record"

/**
 * Environment variable read for each required record field.
 */
export const CONFIG_ENV_VARS = {
  url: "PYSUITECRM_URL",
  clientId: "PYSUITECRM_CLIENT_ID",
  clientSecret: "PYSUITECRM_CLIENT_SECRET",
} as const

export type EnvConfigParserOptions = {
  /**
   * Environment to read. Defaults to `process.env`, read at parse time.
   */
  env?: Record<string, string | undefined>

  logger?: Logger
}

/**
 * Reads the record from `PYSUITECRM_URL`, `PYSUITECRM_CLIENT_ID` and
 * `PYSUITECRM_CLIENT_SECRET`. Custom modules cannot be expressed in the
 * environment and are always empty.
 */
export class EnvConfigParser implements ConfigParser {
  readonly name = "env"
  private readonly env: Record<string, string | undefined>
  private readonly logger: Logger
  private record: ConfigRecord | undefined

  constructor(options: EnvConfigParserOptions = {}) {
    this.env = options.env ?? process.env
    this.logger = (options.logger ?? createNullLogger()).child({
      module: "config",
      source: this.name,
    })
  }

  get parsedConfig(): ConfigRecord | undefined {
    return this.record
  }

  parseConfig(): ConfigRecord {
    if (this.record !== undefined) return this.record

    const url = this.read(CONFIG_ENV_VARS.url)
    const clientId = this.read(CONFIG_ENV_VARS.clientId)
    const clientSecret = this.read(CONFIG_ENV_VARS.clientSecret)

    if (url === undefined || clientId === undefined || clientSecret === undefined) {
      const missing = Object.values(CONFIG_ENV_VARS).filter(
        (name) => this.read(name) === undefined,
      )
      const err = new ConfigError(
        "invalid_env",
        `Invalid environment variables: ${missing.join(", ")} must be set and non-empty`,
        { context: { missing } },
      )

      this.logger.warn("configuration rejected", { err })
      throw err
    }

    this.record = createConfigRecord({ url, clientId, clientSecret })
    this.logger.debug("configuration parsed")

    return this.record
  }

  /** Empty values count as absent. */
  private read(name: string): string | undefined {
    const value = this.env[name]

    return value === undefined || value === "" ? undefined : value
  }
}
