// Command line dispatch
export * from "./command/index.js"

// Signature and documentation introspection
export * from "./introspector/index.js"

// Common errors
export * from "./common/errors/index.js"

// Configuration
export * from "./common/config.js"
export { type LogLevel, LOG_LEVELS } from "./common/utils.js"

export { listFiles } from "./utils/files.js"
