export {
  CONFIG_ENV_VARS,
  EnvConfigParser,
  type EnvConfigParserOptions,
} from "./adapters/env/env-config-parser"
export {
  type JsonConfigFile,
  JsonConfigParser,
  type JsonConfigParserOptions,
  jsonConfigFileSchema,
} from "./adapters/json/json-config-parser"
export {
  ConfigError,
  type ConfigErrorCode,
  type ConfigErrorOptions,
  configErrorCodes,
  isConfigError,
} from "./core/errors/config-error"
export { configRecordSchema, createConfigRecord } from "./core/record/config-record"
export type { ConfigParser } from "./ports/config-parser"
export type { ConfigRecord, CustomModule } from "./ports/config-record"
