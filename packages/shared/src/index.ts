/**
 * @sslctl/shared
 *
 * Configuration, validation, errors and logging used by every package in the monorepo.
 *
 * @example
 * ```typescript
 * import { loadConfig, validateDomain } from "@sslctl/shared"
 *
 * const config = loadConfig()
 * const domain = validateDomain("Example.com") // "example.com"
 * ```
 */

export {
  type ChallengeMethod,
  CHALLENGE_METHODS,
  type EnvInput,
  envSchema,
  EXPIRY_SOURCES,
  type ExpirySource,
  LOG_LEVELS,
  type LogLevel,
} from "./config-schema.js"
export { createConfig, describeConfig, type EnvSource, loadConfig, loadEnvFile, type SslConfig } from "./config.js"
export {
  extractErrorCode,
  formatError,
  isEnvironmentError,
  isSslError,
  SslError,
  type SslErrorCode,
  type SslErrorDetail,
} from "./errors.js"
export {
  consoleSink,
  createLogger,
  type CreateLoggerOptions,
  type LogContext,
  type LogEntry,
  type Logger,
  type LogSink,
  silentLogger,
} from "./logger.js"
export {
  type Domain,
  domainSchema,
  HOSTNAME_PATTERN,
  isValidDomain,
  isValidPort,
  type Port,
  portSchema,
  validateDomain,
  validatePort,
} from "./validation.js"
