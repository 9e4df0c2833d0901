import logger from "node-color-log"

export type LogLevel = "debug" | "info" | "warn" | "error" | "disable"

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "disable",
]

export { logger }

export const log = (stack?: string) =>
  logger.bgColor("red").color("black").log(stack)

export function setLogLevel(level: LogLevel): void {
  logger.setLevel(level)
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

export const LOG_LEVEL_ENV = "CMDSIG_LOG_LEVEL"
export const DEFAULT_LOG_LEVEL: LogLevel = "warn"

/**
 * Level the shared logger starts at, before any `Cli` applies its own
 * configuration.
 */
export function initialLogLevel(
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const level = env[LOG_LEVEL_ENV]?.trim().toLowerCase()

  return level && isLogLevel(level) ? level : DEFAULT_LOG_LEVEL
}

// Commands register while their modules load, before a Cli exists.
setLogLevel(initialLogLevel())

/**
 * Short, human readable rendering of an arbitrary value for error messages.
 */
export function describeValue(value: unknown): string {
  if (typeof value === "string") {
    return JSON.stringify(value)
  }

  if (typeof value === "function") {
    return value.name || "<anonymous>"
  }

  if (typeof value === "object" && value !== null) {
    return value.constructor?.name ?? "Object"
  }

  return String(value)
}
