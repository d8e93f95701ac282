import { type ChallengeMethod, type Logger, SslError } from "@sslctl/shared"
import { CommandError, type CommandRunner } from "./common.js"

/** Local part of the ACME registration address */
export const REGISTRATION_LOCAL_PART = "admin"

export interface CertbotDeps {
  runner: CommandRunner
  logger: Logger
}

export interface IssueCertificateParams {
  domain: string
  /** Domain of the registration address; empty falls back to the certificate domain */
  emailDomain: string
  webroot: string
  challenge: ChallengeMethod
}

export interface IssueCertificateResult {
  email: string
  output: string
}

export function registrationEmail(domain: string, emailDomain: string): string {
  return `${REGISTRATION_LOCAL_PART}@${emailDomain || domain}`
}

export function certbotIssueArgs(params: IssueCertificateParams, email: string): string[] {
  const challengeArgs = params.challenge === "nginx" ? ["--nginx"] : ["--webroot", "-w", params.webroot]
  return [
    "certonly",
    ...challengeArgs,
    "-d",
    params.domain,
    "--agree-tos",
    "--email",
    email,
    "--non-interactive",
    "--keep-until-expiring",
  ]
}

async function runCertbot(
  runner: CommandRunner,
  domain: string,
  command: string,
  args: string[],
): Promise<{ stdout: string }> {
  const label = [command, ...args].join(" ")
  try {
    const result = await runner.run(command, args, { sudo: true })
    if (result.exitCode !== 0) {
      throw SslError.issuanceFailed(domain, {
        command: label,
        exitCode: result.exitCode,
        stderr: result.stderr || result.stdout,
      })
    }
    return { stdout: result.stdout }
  } catch (error) {
    if (error instanceof CommandError) {
      throw SslError.issuanceFailed(domain, { command: label, exitCode: error.exitCode, stderr: error.message })
    }
    throw error
  }
}

/**
 * Obtain (or renew) a certificate for the domain with certbot, non-interactively
 *
 * @throws SslError ISSUANCE_FAILED carrying certbot's output and exit code
 */
export async function issueCertificate(params: IssueCertificateParams, deps: CertbotDeps): Promise<IssueCertificateResult> {
  const { runner, logger } = deps
  const email = registrationEmail(params.domain, params.emailDomain)

  if (params.challenge === "webroot") {
    await runCertbot(runner, params.domain, "mkdir", ["-p", `${params.webroot}/.well-known/acme-challenge`])
  }

  logger.info(`Requesting certificate for ${params.domain} (${params.challenge} challenge, ${email})`)
  const { stdout } = await runCertbot(runner, params.domain, "certbot", certbotIssueArgs(params, email))
  return { email, output: stdout }
}

/**
 * Remove the certificate from certbot's storage.
 * Does not revoke it with the CA.
 *
 * @throws SslError CERT_DELETE_FAILED
 */
export async function deleteCertificate(domain: string, deps: CertbotDeps): Promise<void> {
  const args = ["delete", "--cert-name", domain, "--non-interactive"]
  const label = `certbot ${args.join(" ")}`
  try {
    const result = await deps.runner.run("certbot", args, { sudo: true })
    if (result.exitCode !== 0) {
      throw SslError.certDeleteFailed(domain, {
        command: label,
        exitCode: result.exitCode,
        stderr: result.stderr || result.stdout,
      })
    }
  } catch (error) {
    if (error instanceof CommandError) {
      throw SslError.certDeleteFailed(domain, { command: label, exitCode: error.exitCode, stderr: error.message })
    }
    throw error
  }
  deps.logger.info(`Deleted certificate ${domain} from certbot storage`)
}
