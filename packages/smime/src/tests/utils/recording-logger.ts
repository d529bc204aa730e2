import type { LogContextPatch, Logger, LogLevelName, LogMeta } from "@sealpost/logger"

export type LogEntry = {
  level: LogLevelName
  message: string
  meta: LogMeta & Record<string, unknown>
}

/**
 * Logger that keeps every entry in memory, child context merged into meta.
 */
export function createRecordingLogger(
  entries: LogEntry[] = [],
  context: LogContextPatch = {},
): Logger & { entries: LogEntry[] } {
  const record = (level: LogLevelName) => (message: string, meta?: LogMeta) => {
    entries.push({ level, message, meta: { ...context, ...meta } })
  }

  return {
    entries,
    trace: record("trace"),
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    fatal: record("fatal"),
    child: (patch) => createRecordingLogger(entries, { ...context, ...patch }),
  }
}
