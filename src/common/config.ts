import {
  DEFAULT_LOG_LEVEL,
  LOG_LEVEL_ENV,
  type LogLevel,
  isLogLevel,
  logger,
} from "./utils.js"

export { LOG_LEVEL_ENV }

/**
 * Settings shared by every part of the CLI.
 */
export type Config = {
  /**
   * Level of the shared logger.
   * @defaultValue "warn"
   */
  logLevel: LogLevel

  /**
   * Fail when a `@param` tag names a parameter the signature does not have.
   * When disabled the tag is skipped with a warning.
   * @defaultValue true
   */
  strictDocs: boolean
}

export const STRICT_DOCS_ENV = "CMDSIG_STRICT_DOCS"

export const DEFAULT_CONFIG: Readonly<Config> = {
  logLevel: DEFAULT_LOG_LEVEL,
  strictDocs: true,
}

/**
 * Build the configuration from the environment.
 *
 * Explicit overrides always win over the environment, which wins over
 * the defaults.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Config> = {},
): Config {
  const config: Config = { ...DEFAULT_CONFIG }

  const logLevel = env[LOG_LEVEL_ENV]?.trim().toLowerCase()
  if (logLevel) {
    if (isLogLevel(logLevel)) {
      config.logLevel = logLevel
    } else {
      logger.warn(
        `ignoring ${LOG_LEVEL_ENV}=${logLevel}, expected one of debug, info, warn, error, disable`,
      )
    }
  }

  const strictDocs = env[STRICT_DOCS_ENV]?.trim().toLowerCase()
  if (strictDocs) {
    config.strictDocs = !["false", "0", "no", "off"].includes(strictDocs)
  }

  return {
    logLevel: overrides.logLevel ?? config.logLevel,
    strictDocs: overrides.strictDocs ?? config.strictDocs,
  }
}
