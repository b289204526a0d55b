import { z } from "zod"
import type { ConfigRecord, CustomModule } from "../../ports/config-record"
import { ConfigError } from "../errors/config-error"

export const customModulesSchema = z.array(z.record(z.string(), z.string()))

export const configRecordSchema = z.strictObject({
  url: z.string().min(1),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  customModules: z.optional(customModulesSchema),
})

/**
 * Flattens zod issues into `path: message` lines for error context.
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.map(String).join(".")

    return `${path || "(root)"}: ${issue.message}`
  })
}

/**
 * Builds a deep-frozen ConfigRecord.
 *
 * Required fields have no defaults; `customModules` defaults to `[]`.
 *
 * @throws {ConfigError} `invalid_config` when a field is missing, empty,
 *   mistyped or unknown.
 */
export function createConfigRecord(input: unknown): ConfigRecord {
  const result = configRecordSchema.safeParse(input)

  if (!result.success) {
    throw new ConfigError(
      "invalid_config",
      `Invalid configuration:\n${z.prettifyError(result.error)}`,
      { context: { issues: describeIssues(result.error) } },
    )
  }

  const { url, clientId, clientSecret, customModules = [] } = result.data

  return Object.freeze({
    url,
    clientId,
    clientSecret,
    customModules: Object.freeze(
      customModules.map((module): CustomModule => Object.freeze({ ...module })),
    ),
  })
}
