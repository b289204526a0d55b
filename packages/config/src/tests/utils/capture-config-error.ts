import { ConfigError } from "../../core/errors/config-error"

export function captureConfigError(fn: () => unknown): ConfigError {
  try {
    fn()
  } catch (err) {
    if (err instanceof ConfigError) return err
    throw err
  }

  throw new Error("expected a ConfigError to be thrown")
}
