import { readFileSync } from "node:fs"
import path from "node:path"
import { createNullLogger, type Logger } from "@crm-link/logger"
import { z } from "zod"
import { ConfigError } from "../../core/errors/config-error"
import {
  createConfigRecord,
  customModulesSchema,
  describeIssues,
} from "../../core/record/config-record"
import type { ConfigParser } from "../../ports/config-parser"
import type { ConfigRecord } from "../../ports/config-record"

/**
 * On-disk format. Keys are snake_case:
 *
 * ```json
 * {
 *   "url": "https://crm.example.com",
 *   "client_id": "abc",
 *   "client_secret": "s3cr3t",
 *   "custom_modules": [{ "name": "Leads" }]
 * }
 * ```
 */
export const jsonConfigFileSchema = z.strictObject({
  url: z.string().min(1),
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  custom_modules: z.optional(customModulesSchema),
})

export type JsonConfigFile = z.infer<typeof jsonConfigFileSchema>

const knownKeys = Object.keys(jsonConfigFileSchema.shape)
const requiredKeys = ["url", "client_id", "client_secret"]

export type JsonConfigParserOptions = {
  /**
   * Base directory for a relative `file`.
   *
   * @default process.cwd()
   */
  cwd?: string

  logger?: Logger
}

/**
 * Reads a JSON configuration file.
 *
 * The file is read and decoded when the parser is constructed; `parseConfig()`
 * only checks the decoded document against {@link jsonConfigFileSchema}.
 *
 * @throws {ConfigError} from the constructor: `filesystem_error` when the file
 *   cannot be read, `unreadable_source` when it is not JSON, decodes to an
 *   empty value, or is not an object. Decode failures carry the offset in
 *   `context.position` where the engine reports one, never file content.
 */
export class JsonConfigParser implements ConfigParser {
  readonly name: string
  readonly file: string
  private readonly logger: Logger
  private readonly document: Readonly<Record<string, unknown>>
  private record: ConfigRecord | undefined

  constructor(file: string, options: JsonConfigParserOptions = {}) {
    this.name = `json:${file}`
    this.file = path.resolve(options.cwd ?? process.cwd(), file)
    this.logger = (options.logger ?? createNullLogger()).child({
      module: "config",
      source: this.name,
      file: this.file,
    })
    this.document = this.load()
  }

  get parsedConfig(): ConfigRecord | undefined {
    return this.record
  }

  /**
   * @throws {ConfigError} `schema_mismatch` when keys are unknown, missing,
   *   empty or of the wrong type.
   */
  parseConfig(): ConfigRecord {
    if (this.record !== undefined) return this.record

    const result = jsonConfigFileSchema.safeParse(this.document)

    if (!result.success) {
      const keys = Object.keys(this.document)

      throw this.reject(
        new ConfigError(
          "schema_mismatch",
          `Configuration file ${this.file} does not match the expected format:\n${z.prettifyError(result.error)}`,
          {
            context: {
              file: this.file,
              unknownKeys: keys.filter((key) => !knownKeys.includes(key)),
              missingKeys: requiredKeys.filter((key) => !keys.includes(key)),
              issues: describeIssues(result.error),
            },
          },
        ),
      )
    }

    const { url, client_id, client_secret, custom_modules } = result.data

    this.record = createConfigRecord({
      url,
      clientId: client_id,
      clientSecret: client_secret,
      ...(custom_modules !== undefined && { customModules: custom_modules }),
    })
    this.logger.debug("configuration parsed", {
      customModules: this.record.customModules.length,
    })

    return this.record
  }

  private load(): Readonly<Record<string, unknown>> {
    let content: string

    try {
      content = readFileSync(this.file, "utf-8")
    } catch (err) {
      throw this.reject(
        new ConfigError("filesystem_error", `Could not read configuration file ${this.file}`, {
          context: { file: this.file, errno: errnoCode(err) },
          cause: err,
        }),
      )
    }

    let decoded: unknown

    try {
      decoded = JSON.parse(content)
    } catch (err) {
      // SyntaxError messages quote file content; only the offset is kept.
      const position = syntaxErrorPosition(err)

      throw this.reject(
        new ConfigError("unreadable_source", `Configuration file ${this.file} is not valid JSON`, {
          context: { file: this.file, ...(position !== undefined && { position }) },
        }),
      )
    }

    if (isEmptyDocument(decoded)) {
      throw this.reject(
        new ConfigError("unreadable_source", `Configuration file ${this.file} is empty`, {
          context: { file: this.file },
        }),
      )
    }

    if (!isJsonObject(decoded)) {
      throw this.reject(
        new ConfigError(
          "unreadable_source",
          `Configuration file ${this.file} must contain a JSON object`,
          { context: { file: this.file, type: Array.isArray(decoded) ? "array" : typeof decoded } },
        ),
      )
    }

    return Object.freeze(decoded)
  }

  private reject(err: ConfigError): ConfigError {
    this.logger.warn("configuration rejected", { err })

    return err
  }
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/** `null`, `false`, `0`, `""`, `{}` and `[]` carry no configuration. */
function isEmptyDocument(value: unknown): boolean {
  if (!value) return true

  return typeof value === "object" && Object.keys(value).length === 0
}

function syntaxErrorPosition(err: unknown): number | undefined {
  const match = err instanceof SyntaxError ? /at position (\d+)/.exec(err.message) : null

  return match?.[1] === undefined ? undefined : Number(match[1])
}

function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string"
    ? err.code
    : undefined
}
