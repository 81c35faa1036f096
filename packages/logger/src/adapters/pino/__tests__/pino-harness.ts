import { Writable } from "node:stream"
import type { CapturedLog, LoggerHarness } from "../../../ports/__tests__/logger-harness"
import type { LogLevelName } from "../../../ports/log-level"
import { PinoLogger } from "../pino-logger"

const pinoLevelToName: Record<number, LogLevelName> = {
  10: "trace",
  20: "debug",
  30: "info",
  40: "warn",
  50: "error",
  60: "fatal",
}

export function captureLines(): { lines: Record<string, unknown>[]; destination: Writable } {
  const lines: Record<string, unknown>[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const text = chunk.toString("utf8").trim()
      if (text) lines.push(JSON.parse(text))
      callback()
    },
  })

  return { lines, destination }
}

export function pinoHarness(): LoggerHarness {
  return {
    name: "PinoLogger",
    make: (opts) => {
      const { lines, destination } = captureLines()

      const read = (): CapturedLog[] =>
        lines.map((payload) => ({
          level: pinoLevelToName[Number(payload["level"])] ?? "info",
          payload,
        }))

      return {
        logger: new PinoLogger(
          { destination },
          { level: opts?.level ?? "trace", redact: opts?.redact ?? [] },
        ),
        read,
        clear: () => {
          lines.length = 0
        },
      }
    },
  }
}
