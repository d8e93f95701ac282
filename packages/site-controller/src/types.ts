import type { SslErrorCode } from "@sslctl/shared"

/**
 * Phases of the setup workflow, in execution order
 */
export type SetupPhase = "validation" | "tools" | "port-test" | "config-write" | "cert-issue" | "finalize"

export interface SetupOptions {
  /** Answer plain HTTP with a redirect to HTTPS (default: true) */
  sslRedirect?: boolean
  /** Probe the forwarded port before touching any configuration (default: false) */
  testPort?: boolean
}

/**
 * Result of a setup operation
 */
export interface SetupResult {
  success: boolean
  /** Normalised domain, or the raw input when it failed validation */
  domain: string
  /** Forwarded port, once validated */
  port?: number
  /** Final configuration file in sites-available */
  configPath?: string
  /** Problems that did not stop the setup, e.g. tools installed on the fly */
  warnings: string[]
  message?: string
  error?: string
  errorCode?: SslErrorCode
  /** Which phase failed (if applicable) */
  failedPhase?: SetupPhase
  /** Whether the configuration written during this run was rolled back */
  rolledBack?: boolean
}

export interface RemoveOptions {
  /** Also delete the certificate from certbot's storage (default: false, never revokes) */
  deleteCertificate?: boolean
}

/**
 * Result of a remove operation
 */
export interface RemoveResult {
  success: boolean
  domain: string
  /** Whether a site configuration existed and was deleted */
  removed?: boolean
  certificateDeleted?: boolean
  message?: string
  error?: string
  errorCode?: SslErrorCode
}

/**
 * Result of a certificate expiry check
 */
export interface ExpiryResult {
  success: boolean
  domain: string
  /** notAfter is still in the future */
  isActive?: boolean
  /** ISO-8601 not-after timestamp */
  notAfter?: string
  /** Whole days until expiry, negative once expired */
  daysRemaining?: number
  error?: string
  errorCode?: SslErrorCode
}
