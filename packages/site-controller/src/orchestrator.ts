import {
  createLogger,
  formatError,
  type Logger,
  type SslConfig,
  SslError,
  validateDomain,
  validatePort,
} from "@sslctl/shared"
import { deleteCertificate, issueCertificate } from "./executors/certbot.js"
import { type CommandRunner, ShellCommandRunner } from "./executors/common.js"
import { NginxSiteManager, type SiteSnapshot } from "./executors/nginx.js"
import { readCertificateExpiry } from "./executors/openssl.js"
import { testPortReachable } from "./executors/port.js"
import { ensureRequiredTools } from "./executors/tools.js"
import type {
  ExpiryResult,
  RemoveOptions,
  RemoveResult,
  SetupOptions,
  SetupPhase,
  SetupResult,
} from "./types.js"

const DAY_MS = 24 * 60 * 60 * 1000
const TOTAL_PHASES = 6

export interface OrchestratorDeps {
  config: SslConfig
  runner: CommandRunner
  logger: Logger
  probePort: (port: number, timeoutSeconds: number) => Promise<boolean>
  now: () => Date
}

export type OrchestratorInit = Partial<OrchestratorDeps> & Pick<OrchestratorDeps, "config">

/**
 * HTTPS provisioning orchestrator
 * Sequential execution with rollback of the nginx configuration when issuance fails
 */
export class SslOrchestrator {
  private readonly config: SslConfig
  private readonly runner: CommandRunner
  private readonly logger: Logger
  private readonly probePort: OrchestratorDeps["probePort"]
  private readonly now: () => Date
  private readonly nginx: NginxSiteManager

  constructor(init: OrchestratorInit) {
    this.config = init.config
    this.logger = init.logger ?? createLogger({ level: init.config.logLevel })
    this.runner =
      init.runner ??
      new ShellCommandRunner({
        sudoCommand: init.config.commands.sudo,
        timeoutMs: init.config.timeouts.commandSeconds * 1000,
        logger: this.logger.child("exec"),
      })
    this.probePort = init.probePort ?? testPortReachable
    this.now = init.now ?? (() => new Date())
    this.nginx = new NginxSiteManager({
      config: this.config,
      runner: this.runner,
      logger: this.logger.child("nginx"),
    })
  }

  /**
   * Provision HTTPS for a domain forwarding to a local port.
   * Re-running for a configured domain overwrites its configuration and renews the certificate.
   *
   * Non-SslError failures (e.g. no permission on the nginx directories) propagate.
   */
  async setup(domainInput: string, portInput: number | string, options: SetupOptions = {}): Promise<SetupResult> {
    const { sslRedirect = true, testPort = false } = options
    const log = this.logger.child("setup")
    const warnings: string[] = []

    let phase: SetupPhase = "validation"
    let domain = domainInput
    let port: number | undefined
    let snapshot: SiteSnapshot | undefined

    const announce = (step: number, name: SetupPhase, message: string) => {
      phase = name
      log.info(`[Phase ${step}/${TOTAL_PHASES}] ${message}`)
    }

    log.info(`=== Starting SSL setup for ${domainInput} ===`)

    try {
      announce(1, "validation", "Validating domain and port...")
      const validDomain = validateDomain(domainInput)
      const validPort = validatePort(portInput)
      domain = validDomain
      port = validPort

      announce(2, "tools", "Checking required tools...")
      const tools = await ensureRequiredTools(["nginx", "certbot"], {
        runner: this.runner,
        config: this.config,
        logger: this.logger.child("tools"),
      })
      if (tools.missing.length > 0) {
        throw SslError.toolMissing(tools.missing.map(tool => tool.displayName))
      }
      for (const tool of tools.installed) {
        warnings.push(`${tool.displayName} was missing and has been installed with ${this.config.commands.packageManager}`)
      }

      if (testPort) {
        announce(3, "port-test", `Testing port ${validPort}...`)
        const timeout = this.config.timeouts.portTestSeconds
        if (!(await this.probePort(validPort, timeout))) {
          throw SslError.portUnreachable(validPort, timeout)
        }
      } else {
        log.info(`[Phase 3/${TOTAL_PHASES}] Skipping port test`)
      }

      announce(4, "config-write", "Writing initial nginx configuration...")
      snapshot = await this.nginx.snapshot(validDomain)
      await this.nginx.writeSiteConfig(validDomain, validPort, { stage: "initial" })

      announce(5, "cert-issue", "Obtaining certificate...")
      await issueCertificate(
        {
          domain: validDomain,
          emailDomain: this.config.letsencrypt.emailDomain,
          webroot: this.config.letsencrypt.webroot,
          challenge: this.config.letsencrypt.challenge,
        },
        { runner: this.runner, logger: this.logger.child("certbot") },
      )
      // Certificate exists from here on; later failures keep the configuration
      snapshot = undefined

      announce(6, "finalize", "Writing final nginx configuration...")
      const configPath = await this.nginx.writeSiteConfig(validDomain, validPort, {
        stage: "final",
        redirect: sslRedirect,
      })

      for (const warning of warnings) {
        log.warn(warning)
      }
      log.info(`=== SSL setup successful: https://${validDomain} -> 127.0.0.1:${validPort} ===`)

      return {
        success: true,
        domain: validDomain,
        port: validPort,
        configPath,
        warnings,
        message: `Your site is now available at: https://${validDomain}`,
      }
    } catch (error) {
      log.error(`✗ Setup failed during ${phase}`, error)

      const rolledBack = snapshot ? await this.rollback(snapshot) : undefined

      if (!(error instanceof SslError)) {
        throw error
      }

      return {
        success: false,
        domain,
        port,
        warnings,
        error: error.message,
        errorCode: error.code,
        failedPhase: phase,
        rolledBack,
      }
    }
  }

  /**
   * Remove the serving configuration for a domain. The certificate stays in
   * certbot's storage unless deleteCertificate is set; it is never revoked.
   */
  async remove(domainInput: string, options: RemoveOptions = {}): Promise<RemoveResult> {
    const log = this.logger.child("remove")
    let domain = domainInput

    try {
      const validDomain = validateDomain(domainInput)
      domain = validDomain

      log.info(`Removing nginx configuration for ${validDomain}...`)
      const removed = await this.nginx.removeSiteConfig(validDomain)

      let certificateDeleted = false
      if (options.deleteCertificate) {
        await deleteCertificate(validDomain, { runner: this.runner, logger: this.logger.child("certbot") })
        certificateDeleted = true
      }

      const message = removed
        ? `Domain ${validDomain} has been removed from nginx.`
        : `Domain ${validDomain} had no nginx configuration; nothing to remove.`

      return {
        success: true,
        domain: validDomain,
        removed,
        certificateDeleted,
        message: certificateDeleted ? `${message} Its certificate has been deleted.` : message,
      }
    } catch (error) {
      if (!(error instanceof SslError)) {
        throw error
      }
      log.error("✗ Remove failed", error)
      return { success: false, domain, error: error.message, errorCode: error.code }
    }
  }

  /**
   * Report whether the domain's certificate is still within its validity period
   */
  async check(domainInput: string): Promise<ExpiryResult> {
    const log = this.logger.child("check")
    let domain = domainInput

    try {
      const validDomain = validateDomain(domainInput)
      domain = validDomain

      // The certificate outlives a removed site; only managed sites report a status
      if (!(await this.nginx.hasSiteConfig(validDomain))) {
        throw SslError.siteNotConfigured(validDomain)
      }

      const notAfter = await readCertificateExpiry(validDomain, {
        runner: this.runner,
        config: this.config,
        logger: this.logger.child("openssl"),
      })
      const remainingMs = notAfter.getTime() - this.now().getTime()

      return {
        success: true,
        domain: validDomain,
        isActive: remainingMs > 0,
        notAfter: notAfter.toISOString(),
        daysRemaining: Math.floor(remainingMs / DAY_MS),
      }
    } catch (error) {
      if (!(error instanceof SslError)) {
        throw error
      }
      log.error("✗ Expiry check failed", error)
      return { success: false, domain, error: error.message, errorCode: error.code }
    }
  }

  /**
   * Put the configuration back to what it was before this run.
   * Never throws; a failed rollback is logged and reported as false.
   */
  private async rollback(snapshot: SiteSnapshot): Promise<boolean> {
    const log = this.logger.child("rollback")
    log.info(`=== Rolling back nginx configuration for ${snapshot.domain} ===`)
    try {
      await this.nginx.restore(snapshot)
      log.info(
        snapshot.content === null
          ? "✓ Rollback successful - configuration removed"
          : "✓ Rollback successful - previous configuration restored",
      )
      return true
    } catch (rollbackError) {
      log.error(`✗ Rollback failed: ${formatError(rollbackError)}`)
      return false
    }
  }
}
