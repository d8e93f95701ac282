/**
 * ============================================================================
 * RUNTIME CONFIGURATION - SINGLE SOURCE OF TRUTH
 * ============================================================================
 *
 * Settings are read once from the environment (optionally seeded from a .env
 * file) and handed to every component as a frozen SslConfig object. Nothing
 * reads process.env after start-up.
 *
 * Organization:
 * - nginx: site directories and service name
 * - letsencrypt: certbot inputs and certificate locations
 * - tls: protocols and ciphers written into the HTTPS block
 * - ports: listening ports of the proxy
 * - commands: privilege escalation, package manager, service control
 * - timeouts: seconds
 */

import { existsSync } from "node:fs"
import { join } from "node:path"
import { config as loadDotenv } from "dotenv"
import {
  type ChallengeMethod,
  type EnvInput,
  envSchema,
  type ExpirySource,
  type LogLevel,
  type ParsedEnv,
} from "./config-schema.js"

export interface SslConfig {
  readonly nginx: {
    readonly sitesAvailable: string
    readonly sitesEnabled: string
    readonly serviceName: string
  }
  readonly letsencrypt: {
    /** Domain of the registration address; empty means the provisioned domain */
    readonly emailDomain: string
    readonly webroot: string
    readonly liveDir: string
    readonly challenge: ChallengeMethod
  }
  readonly tls: {
    readonly protocols: string
    readonly ciphers: string
  }
  readonly ports: {
    readonly http: number
    readonly https: number
  }
  readonly commands: {
    readonly sudo: string
    readonly packageManager: string
    readonly serviceControl: string
  }
  readonly timeouts: {
    readonly portTestSeconds: number
    readonly commandSeconds: number
  }
  readonly expirySource: ExpirySource
  readonly logLevel: LogLevel
}

export type EnvSource = Record<string, string | undefined>

/**
 * Explicitly load a .env file into process.env.
 *
 * Call this once at the CLI entry point. Not called on import (no side effects).
 * Variables already present in the environment win over the file.
 *
 * @returns true if the file was loaded, false if not found
 */
export function loadEnvFile(path: string = join(process.cwd(), ".env")): boolean {
  if (!existsSync(path)) {
    return false
  }
  loadDotenv({ path })
  return true
}

function toConfig(env: ParsedEnv): SslConfig {
  return {
    nginx: {
      sitesAvailable: env.NGINX_SITES_AVAILABLE,
      sitesEnabled: env.NGINX_SITES_ENABLED,
      serviceName: env.NGINX_SERVICE,
    },
    letsencrypt: {
      emailDomain: env.LETSENCRYPT_EMAIL_DOMAIN,
      webroot: env.LETSENCRYPT_WEBROOT,
      liveDir: env.LETSENCRYPT_LIVE_DIR,
      challenge: env.CERTBOT_CHALLENGE,
    },
    tls: {
      protocols: env.SSL_PROTOCOLS,
      ciphers: env.SSL_CIPHERS,
    },
    ports: {
      http: env.DEFAULT_HTTP_PORT,
      https: env.DEFAULT_HTTPS_PORT,
    },
    commands: {
      sudo: env.SUDO_COMMAND.trim(),
      packageManager: env.APT_GET_COMMAND,
      serviceControl: env.SYSTEMCTL_COMMAND,
    },
    timeouts: {
      portTestSeconds: env.PORT_TEST_TIMEOUT,
      commandSeconds: env.COMMAND_TIMEOUT,
    },
    expirySource: env.EXPIRY_CHECK_SOURCE,
    logLevel: env.LOG_LEVEL,
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child && typeof child === "object") {
      deepFreeze(child)
    }
  }
  return Object.freeze(value)
}

/**
 * Build the configuration from environment variables - STRICT MODE
 * Invalid values fail fast instead of silently falling back to defaults.
 */
export function loadConfig(env: EnvSource = process.env): SslConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`)
    throw new Error(`FATAL: Invalid configuration - ${problems.join("; ")}`)
  }
  return deepFreeze(toConfig(result.data))
}

/**
 * Configuration built from defaults only, with optional overrides.
 * Handy for tests and for callers that do not want the ambient environment.
 */
export function createConfig(overrides: EnvInput = {}): SslConfig {
  const env: EnvSource = {}
  for (const [key, value] of Object.entries(overrides)) {
    env[key] = value === undefined ? undefined : String(value)
  }
  return loadConfig(env)
}

/**
 * Rows for displaying the effective configuration, in display order.
 */
export function describeConfig(config: SslConfig): Array<{ label: string; value: string }> {
  return [
    { label: "Nginx sites-available", value: config.nginx.sitesAvailable },
    { label: "Nginx sites-enabled", value: config.nginx.sitesEnabled },
    { label: "Nginx service", value: config.nginx.serviceName },
    { label: "Let's Encrypt email domain", value: config.letsencrypt.emailDomain || "(domain being provisioned)" },
    { label: "Webroot path", value: config.letsencrypt.webroot },
    { label: "Certificate live dir", value: config.letsencrypt.liveDir },
    { label: "Challenge method", value: config.letsencrypt.challenge },
    { label: "SSL protocols", value: config.tls.protocols },
    { label: "SSL ciphers", value: config.tls.ciphers },
    { label: "Default HTTP port", value: String(config.ports.http) },
    { label: "Default HTTPS port", value: String(config.ports.https) },
    { label: "Sudo command", value: config.commands.sudo || "(disabled)" },
    { label: "Package manager", value: config.commands.packageManager },
    { label: "System control", value: config.commands.serviceControl },
    { label: "Port test timeout", value: `${config.timeouts.portTestSeconds} seconds` },
    { label: "Command timeout", value: `${config.timeouts.commandSeconds} seconds` },
    { label: "Expiry check source", value: config.expirySource },
    { label: "Log level", value: config.logLevel },
  ]
}
