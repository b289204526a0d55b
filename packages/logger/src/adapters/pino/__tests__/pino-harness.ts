import { Writable } from "node:stream"
import type { CapturedEntry, LoggerHarness } from "../../../ports/__tests__/logger.contract"
import { type LogLevelName, LogLevels } from "../../../ports/log-level"
import { PinoLogger } from "../pino-logger"

const pinoLevelToName: Record<number, LogLevelName> = {
  [LogLevels.Trace]: "trace",
  [LogLevels.Debug]: "debug",
  [LogLevels.Info]: "info",
  [LogLevels.Warn]: "warn",
  [LogLevels.Error]: "error",
  [LogLevels.Fatal]: "fatal",
}

const pinoOwnKeys = new Set(["level", "msg", "time", "pid", "hostname"])

function toEntry(line: string): CapturedEntry {
  const payload: Record<string, unknown> = JSON.parse(line)

  return {
    level: pinoLevelToName[Number(payload.level)] ?? "info",
    msg: typeof payload.msg === "string" ? payload.msg : "",
    fields: Object.fromEntries(
      Object.entries(payload).filter(([key]) => !pinoOwnKeys.has(key)),
    ),
  }
}

export function pinoHarness(): LoggerHarness {
  return {
    name: "PinoLogger",
    make: (level) => {
      const captured: CapturedEntry[] = []

      const destination = new Writable({
        write(chunk, _encoding, callback) {
          captured.push(toEntry(chunk.toString("utf8")))
          callback()
        },
      })

      return {
        logger: new PinoLogger({ destination }, { level }),
        entries: () => [...captured],
        reset: () => {
          captured.length = 0
        },
      }
    },
  }
}
