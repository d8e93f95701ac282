/**
 * Environment Config Zod Schema
 *
 * Every setting the tool reads from the environment, with its default.
 * Pure schema definitions - no runtime code, no side effects.
 */

import { z } from "zod"

const pathStr = z.string().min(1)
const tcpPort = z.coerce.number().int().min(1).max(65535)

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export const CHALLENGE_METHODS = ["webroot", "nginx"] as const
export type ChallengeMethod = (typeof CHALLENGE_METHODS)[number]

export const EXPIRY_SOURCES = ["file", "live"] as const
export type ExpirySource = (typeof EXPIRY_SOURCES)[number]

export const envSchema = z.object({
  // Nginx
  NGINX_SITES_AVAILABLE: pathStr.default("/etc/nginx/sites-available"),
  NGINX_SITES_ENABLED: pathStr.default("/etc/nginx/sites-enabled"),
  NGINX_SERVICE: z.string().min(1).default("nginx"),

  // Let's Encrypt
  LETSENCRYPT_EMAIL_DOMAIN: z
    .string()
    .regex(/^[a-z0-9.-]*$/i, "Must be a domain name")
    .default(""),
  LETSENCRYPT_WEBROOT: pathStr.default("/var/www/html"),
  LETSENCRYPT_LIVE_DIR: pathStr.default("/etc/letsencrypt/live"),
  CERTBOT_CHALLENGE: z.enum(CHALLENGE_METHODS).default("webroot"),

  // TLS
  SSL_PROTOCOLS: z.string().min(1).default("TLSv1.2 TLSv1.3"),
  SSL_CIPHERS: z.string().min(1).default("HIGH:!aNULL:!MD5"),

  // Listening ports
  DEFAULT_HTTP_PORT: tcpPort.default(80),
  DEFAULT_HTTPS_PORT: tcpPort.default(443),

  // System commands (empty SUDO_COMMAND runs everything unprivileged)
  SUDO_COMMAND: z.string().default("sudo"),
  APT_GET_COMMAND: z.string().min(1).default("apt-get"),
  SYSTEMCTL_COMMAND: z.string().min(1).default("systemctl"),

  // Timeouts (seconds)
  PORT_TEST_TIMEOUT: z.coerce.number().int().min(1).default(10),
  COMMAND_TIMEOUT: z.coerce.number().int().min(1).default(300),

  EXPIRY_CHECK_SOURCE: z.enum(EXPIRY_SOURCES).default("file"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
})

export type EnvInput = z.input<typeof envSchema>
export type ParsedEnv = z.infer<typeof envSchema>
