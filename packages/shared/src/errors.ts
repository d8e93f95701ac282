export type SslErrorCode =
  | "INVALID_DOMAIN"
  | "INVALID_PORT"
  | "TOOL_MISSING"
  | "PORT_UNREACHABLE"
  | "ISSUANCE_FAILED"
  | "CONFIG_WRITE_FAILED"
  | "RELOAD_FAILED"
  | "PARSE_ERROR"
  | "SITE_NOT_CONFIGURED"
  | "CHECK_FAILED"
  | "CERT_DELETE_FAILED"
  | "UNKNOWN"

/**
 * Output of the external tool that caused an error, when there was one
 */
export interface SslErrorDetail {
  command?: string
  exitCode?: number
  stderr?: string
}

export class SslError extends Error {
  readonly code: SslErrorCode
  readonly detail?: SslErrorDetail

  constructor(code: SslErrorCode, message: string, detail?: SslErrorDetail, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "SslError"
    this.code = code
    this.detail = detail
  }

  static invalidDomain(domain: string): SslError {
    return new SslError(
      "INVALID_DOMAIN",
      `Invalid domain name: '${domain}'. Please enter it in the format 'example.com'.`,
    )
  }

  static invalidPort(value: unknown): SslError {
    return new SslError("INVALID_PORT", `Invalid port: '${String(value)}'. Expected an integer between 1 and 65535.`)
  }

  static toolMissing(tools: string[]): SslError {
    return new SslError(
      "TOOL_MISSING",
      `${tools.join(", ")} ${tools.length === 1 ? "is" : "are"} not installed on your system. Please install and try again.`,
    )
  }

  static portUnreachable(port: number, timeoutSeconds: number): SslError {
    return new SslError(
      "PORT_UNREACHABLE",
      `Port ${port} is not accessible on 127.0.0.1 or timed out after ${timeoutSeconds}s.`,
    )
  }

  static issuanceFailed(domain: string, detail: SslErrorDetail): SslError {
    const reason = detail.stderr ? `: ${detail.stderr}` : ""
    return new SslError("ISSUANCE_FAILED", `Error obtaining SSL certificate for ${domain}${reason}`, detail)
  }

  static configWriteFailed(path: string, cause: unknown): SslError {
    const reason = cause instanceof Error ? cause.message : String(cause)
    return new SslError("CONFIG_WRITE_FAILED", `Error writing nginx configuration ${path}: ${reason}`, undefined, {
      cause,
    })
  }

  static reloadFailed(detail: SslErrorDetail): SslError {
    const reason = detail.stderr ? `: ${detail.stderr}` : ""
    return new SslError("RELOAD_FAILED", `Error validating or reloading nginx${reason}`, detail)
  }

  static parseError(output: string): SslError {
    return new SslError("PARSE_ERROR", `Error parsing the certificate expiration date from: '${output.trim()}'`)
  }

  static siteNotConfigured(domain: string): SslError {
    return new SslError("SITE_NOT_CONFIGURED", `No nginx site configuration found for ${domain}.`)
  }

  static checkFailed(message: string, detail?: SslErrorDetail): SslError {
    return new SslError("CHECK_FAILED", message, detail)
  }

  static certDeleteFailed(domain: string, detail: SslErrorDetail): SslError {
    const reason = detail.stderr ? `: ${detail.stderr}` : ""
    return new SslError("CERT_DELETE_FAILED", `Error deleting SSL certificate for ${domain}${reason}`, detail)
  }

  static generic(message: string): SslError {
    return new SslError("UNKNOWN", message)
  }
}

export function isSslError(err: unknown): err is SslError {
  return err instanceof SslError
}

/**
 * Extract error code from an error object.
 * Handles Node.js style errors with 'code' property.
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object" || !("code" in err)) {
    return undefined
  }
  return typeof err.code === "string" ? err.code : undefined
}

const ENVIRONMENT_ERROR_CODES = new Set(["EACCES", "EPERM", "EROFS"])

/**
 * Permission problems on system directories cannot be fixed by retrying or rolling back.
 */
export function isEnvironmentError(err: unknown): boolean {
  const code = extractErrorCode(err)
  return code !== undefined && ENVIRONMENT_ERROR_CODES.has(code)
}

export function formatError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
