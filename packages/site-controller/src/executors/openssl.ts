import { type Logger, type SslConfig, SslError } from "@sslctl/shared"
import { CommandError, type CommandResult, type CommandRunner, type RunOptions } from "./common.js"
import { certificatePaths } from "./nginx-template.js"

export interface OpensslDeps {
  runner: CommandRunner
  config: SslConfig
  logger: Logger
}

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"]

// notAfter=Jan  5 12:00:00 2025 GMT
const NOT_AFTER_PATTERN = /notAfter=([A-Z][a-z]{2})\s+(\d{1,2})\s+(\d{2}):(\d{2}):(\d{2})\s+(\d{4})\s+GMT/

const PEM_PATTERN = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/

/**
 * Parse the `notAfter=` line printed by `openssl x509 -enddate`
 *
 * @throws SslError PARSE_ERROR when the output format is not recognised
 */
export function parseNotAfter(output: string): Date {
  const match = NOT_AFTER_PATTERN.exec(output)
  if (!match) {
    throw SslError.parseError(output)
  }

  const [, monthName, day, hours, minutes, seconds, year] = match
  const month = MONTHS.indexOf(monthName)
  if (month === -1) {
    throw SslError.parseError(output)
  }

  const date = new Date(
    Date.UTC(Number(year), month, Number(day), Number(hours), Number(minutes), Number(seconds)),
  )
  // Date.UTC rolls over out-of-range fields (Feb 31 -> Mar 3); reject those
  if (date.getUTCDate() !== Number(day) || date.getUTCMonth() !== month) {
    throw SslError.parseError(output)
  }
  return date
}

async function runOpenssl(runner: CommandRunner, args: string[], options?: RunOptions): Promise<CommandResult> {
  try {
    return await runner.run("openssl", args, options)
  } catch (error) {
    // under sudo the spawned binary is the sudo command, not openssl
    if (error instanceof CommandError && error.notInstalled && error.command.split(" ")[0] === "openssl") {
      throw SslError.toolMissing(["OpenSSL"])
    }
    if (error instanceof CommandError) {
      throw SslError.checkFailed(error.message, { command: error.command, exitCode: error.exitCode, stderr: error.stderr })
    }
    throw error
  }
}

/**
 * Read the expiry of the certificate certbot stored for the domain
 */
async function readStoredCertificateExpiry(domain: string, deps: OpensslDeps): Promise<Date> {
  const certPath = certificatePaths(domain, deps.config.letsencrypt.liveDir).fullchain
  const args = ["x509", "-in", certPath, "-noout", "-enddate"]
  const result = await runOpenssl(deps.runner, args, { sudo: true })

  if (result.exitCode !== 0) {
    throw SslError.checkFailed(`Certificate file not found or unreadable at ${certPath}`, {
      command: `openssl ${args.join(" ")}`,
      exitCode: result.exitCode,
      stderr: result.stderr,
    })
  }
  return parseNotAfter(result.stdout)
}

/**
 * Fetch the certificate nginx currently serves for the domain and read its expiry
 */
async function readServedCertificateExpiry(domain: string, deps: OpensslDeps): Promise<Date> {
  const { runner, config } = deps
  const target = `${domain}:${config.ports.https}`
  const timeoutMs = config.timeouts.portTestSeconds * 1000

  const connectArgs = ["s_client", "-connect", target, "-servername", domain]
  const served = await runOpenssl(runner, connectArgs, { input: "", timeoutMs })
  const pem = PEM_PATTERN.exec(served.stdout)?.[0]
  if (served.exitCode !== 0 || !pem) {
    throw SslError.checkFailed(`Could not retrieve a certificate from ${target}`, {
      command: `openssl ${connectArgs.join(" ")}`,
      exitCode: served.exitCode,
      stderr: served.stderr,
    })
  }

  const inspectArgs = ["x509", "-noout", "-enddate", "-checkhost", domain]
  const inspected = await runOpenssl(runner, inspectArgs, { input: `${pem}\n` })
  if (inspected.exitCode !== 0) {
    throw SslError.checkFailed(`Could not inspect the certificate served by ${target}`, {
      command: `openssl ${inspectArgs.join(" ")}`,
      exitCode: inspected.exitCode,
      stderr: inspected.stderr,
    })
  }
  if (inspected.stdout.includes("does NOT match")) {
    throw SslError.checkFailed(`The certificate served by ${target} is not valid for ${domain}`)
  }
  return parseNotAfter(inspected.stdout)
}

/**
 * Query the certificate's not-after timestamp, from the stored file or the live
 * endpoint depending on the configured expiry source
 *
 * @throws SslError TOOL_MISSING, CHECK_FAILED or PARSE_ERROR
 */
export async function readCertificateExpiry(domain: string, deps: OpensslDeps): Promise<Date> {
  deps.logger.debug(`Reading certificate expiry for ${domain} from ${deps.config.expirySource} source`)
  return deps.config.expirySource === "live"
    ? readServedCertificateExpiry(domain, deps)
    : readStoredCertificateExpiry(domain, deps)
}
