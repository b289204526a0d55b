/**
 * Metadata for a custom CRM module, a flat map such as `{ name: "Leads" }`.
 */
export type CustomModule = Readonly<Record<string, string>>

/**
 * Validated connection settings handed to the CRM API client.
 *
 * Deep-frozen; only ever produced by `createConfigRecord`.
 */
export type ConfigRecord = Readonly<{
  /** Base URL of the CRM instance */
  url: string

  /** OAuth client identifier */
  clientId: string

  /** OAuth client secret */
  clientSecret: string

  customModules: ReadonlyArray<CustomModule>
}>
