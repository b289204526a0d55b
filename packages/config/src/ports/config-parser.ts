import type { ConfigRecord } from "./config-record"

/**
 * Turns one external source into a ConfigRecord.
 *
 * A parser starts with no record. The first successful `parseConfig()` stores
 * it in `parsedConfig`; later calls return that same instance without touching
 * the source again. A failed call throws a `ConfigError` and leaves
 * `parsedConfig` undefined.
 *
 * Parsers are synchronous and meant for a single caller.
 */
export interface ConfigParser {
  /**
   * Provenance of the record for logs and errors.
   * Example: "env", "json:config/crm.json"
   */
  readonly name: string

  /** The cached record, or `undefined` until a parse succeeds */
  readonly parsedConfig: ConfigRecord | undefined

  parseConfig(): ConfigRecord
}
