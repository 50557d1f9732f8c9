// One JSON object per line: { msg, level, ...fields, ts }

export type LogLevel = "debug" | "info" | "warn" | "error"
export type LogFields = Record<string, unknown>

const RANK: Record<LogLevel | "silent", number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 }

function isLevelName(v: string): v is keyof typeof RANK {
  return Object.prototype.hasOwnProperty.call(RANK, v)
}

function threshold(): number {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase()
  return isLevelName(raw) ? RANK[raw] : RANK.info
}

export function logEvent(level: LogLevel, msg: string, fields: LogFields = {}): void {
  if (RANK[level] < threshold()) return
  const line = JSON.stringify({ msg, level, ...fields, ts: new Date().toISOString() })
  if (level === "error" || level === "warn") console.error(line)
  else console.log(line)
}

export function errorFields(err: unknown): LogFields {
  if (err instanceof Error) return { err: err.message, errName: err.name }
  return { err: String(err) }
}
