import { lstat, mkdir, readFile, rename, rm, symlink, writeFile } from "node:fs/promises"
import path from "node:path"
import { extractErrorCode, isEnvironmentError, type Logger, type SslConfig, SslError } from "@sslctl/shared"
import { CommandError, type CommandRunner, runChecked } from "./common.js"
import { renderSiteConfig, type SiteConfigStage } from "./nginx-template.js"

export interface NginxDeps {
  config: SslConfig
  runner: CommandRunner
  logger: Logger
}

export interface SiteConfigPaths {
  /** The rendered file in sites-available */
  available: string
  /** The activation symlink in sites-enabled */
  enabled: string
}

/**
 * What a domain's configuration looked like before a write, so it can be put back
 */
export interface SiteSnapshot {
  domain: string
  /** null when no configuration existed */
  content: string | null
  /** whether the sites-enabled link existed */
  enabled: boolean
}

export interface WriteSiteConfigOptions {
  stage: SiteConfigStage
  redirect?: boolean
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await lstat(filePath)
    return true
  } catch (error) {
    if (extractErrorCode(error) === "ENOENT") return false
    throw error
  }
}

async function atomicWrite(filePath: string, content: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true })
  const tmp = tmpPath(filePath)
  try {
    await writeFile(tmp, content, { encoding: "utf8", mode: 0o644 })
    await rename(tmp, filePath)
  } catch (error) {
    await rm(tmp, { force: true })
    throw error
  }
}

function tmpPath(filePath: string): string {
  return `${filePath}.tmp.${process.pid}`
}

/**
 * Permission problems propagate as-is; everything else becomes CONFIG_WRITE_FAILED.
 */
function toWriteError(filePath: string, error: unknown): unknown {
  if (isEnvironmentError(error) || error instanceof SslError) return error
  return SslError.configWriteFailed(filePath, error)
}

/**
 * Owns the per-domain nginx site files and reloading nginx after changes.
 * With a sudo command configured, file changes go through the runner
 * (`tee`, `mv`, `ln`, `rm` under sudo); otherwise they are made directly.
 */
export class NginxSiteManager {
  constructor(private readonly deps: NginxDeps) {}

  paths(domain: string): SiteConfigPaths {
    const fileName = `${domain}.conf`
    return {
      available: path.join(this.deps.config.nginx.sitesAvailable, fileName),
      enabled: path.join(this.deps.config.nginx.sitesEnabled, fileName),
    }
  }

  async hasSiteConfig(domain: string): Promise<boolean> {
    return exists(this.paths(domain).available)
  }

  async readSiteConfig(domain: string): Promise<string | null> {
    try {
      return await readFile(this.paths(domain).available, "utf8")
    } catch (error) {
      if (extractErrorCode(error) === "ENOENT") return null
      throw error
    }
  }

  async snapshot(domain: string): Promise<SiteSnapshot> {
    return {
      domain,
      content: await this.readSiteConfig(domain),
      enabled: await exists(this.paths(domain).enabled),
    }
  }

  /**
   * Render, write and activate the configuration, then reload nginx.
   * Overwrites any existing configuration for the domain.
   *
   * @returns path of the file in sites-available
   * @throws SslError CONFIG_WRITE_FAILED or RELOAD_FAILED
   */
  async writeSiteConfig(domain: string, port: number, options: WriteSiteConfigOptions): Promise<string> {
    const content = renderSiteConfig(options.stage, { domain, port, redirect: options.redirect }, this.deps.config)
    const filePath = await this.writeFiles(domain, content)
    this.deps.logger.info(`Wrote ${options.stage} configuration to ${filePath}`)
    await this.reload()
    return filePath
  }

  /**
   * Delete both entries for the domain and reload nginx. Absent files are not an error.
   *
   * @returns whether anything was removed
   */
  async removeSiteConfig(domain: string): Promise<boolean> {
    const removed = await this.deleteFiles(domain)
    if (removed) {
      this.deps.logger.info(`Removed nginx configuration for ${domain}`)
    } else {
      this.deps.logger.info(`No nginx configuration present for ${domain}`)
    }
    await this.reload()
    return removed
  }

  /**
   * Put the configuration back the way the snapshot saw it, then reload nginx.
   * A site that was disabled stays disabled.
   */
  async restore(snapshot: SiteSnapshot): Promise<void> {
    if (snapshot.content === null) {
      await this.deleteFiles(snapshot.domain)
    } else if (snapshot.enabled) {
      await this.writeFiles(snapshot.domain, snapshot.content)
    } else {
      const { available, enabled } = this.paths(snapshot.domain)
      await this.writeAvailable(available, snapshot.content)
      if (await exists(enabled)) {
        await this.removeEntry(enabled)
      }
    }
    await this.reload()
  }

  /**
   * Validate the configuration with `nginx -t`, then reload the service
   *
   * @throws SslError RELOAD_FAILED
   */
  async reload(): Promise<void> {
    const { config, runner } = this.deps
    const steps: Array<[string, string[]]> = [
      ["nginx", ["-t"]],
      [config.commands.serviceControl, ["reload", config.nginx.serviceName]],
    ]

    for (const [command, args] of steps) {
      const label = [command, ...args].join(" ")
      try {
        const result = await runner.run(command, args, { sudo: true })
        if (result.exitCode !== 0) {
          throw SslError.reloadFailed({ command: label, exitCode: result.exitCode, stderr: result.stderr })
        }
      } catch (error) {
        if (error instanceof CommandError) {
          throw SslError.reloadFailed({ command: label, exitCode: error.exitCode, stderr: error.stderr })
        }
        throw error
      }
    }

    this.deps.logger.debug("nginx reloaded")
  }

  private get privileged(): boolean {
    return this.deps.config.commands.sudo !== ""
  }

  private async writeFiles(domain: string, content: string): Promise<string> {
    const { available, enabled } = this.paths(domain)
    await this.writeAvailable(available, content)
    await this.linkEnabled(available, enabled)
    return available
  }

  private async writeAvailable(filePath: string, content: string): Promise<void> {
    try {
      if (this.privileged) {
        await this.privilegedWrite(filePath, content)
      } else {
        await atomicWrite(filePath, content)
      }
    } catch (error) {
      throw toWriteError(filePath, error)
    }
  }

  private async privilegedWrite(filePath: string, content: string): Promise<void> {
    const { runner, logger } = this.deps
    const tmp = tmpPath(filePath)
    await runChecked(runner, "mkdir", ["-p", path.dirname(filePath)], { sudo: true })
    try {
      await runChecked(runner, "tee", [tmp], { sudo: true, input: content })
      await runChecked(runner, "mv", ["-f", tmp, filePath], { sudo: true })
    } catch (error) {
      try {
        await runChecked(runner, "rm", ["-f", tmp], { sudo: true })
      } catch (cleanupError) {
        logger.warn(`Could not remove ${tmp}`, cleanupError)
      }
      throw error
    }
  }

  private async linkEnabled(available: string, enabled: string): Promise<void> {
    try {
      if (this.privileged) {
        const { runner } = this.deps
        await runChecked(runner, "mkdir", ["-p", path.dirname(enabled)], { sudo: true })
        await runChecked(runner, "ln", ["-sfn", available, enabled], { sudo: true })
      } else {
        await mkdir(path.dirname(enabled), { recursive: true })
        await rm(enabled, { force: true })
        await symlink(available, enabled)
      }
    } catch (error) {
      throw toWriteError(enabled, error)
    }
  }

  private async removeEntry(filePath: string): Promise<void> {
    try {
      if (this.privileged) {
        await runChecked(this.deps.runner, "rm", ["-f", filePath], { sudo: true })
      } else {
        await rm(filePath, { force: true })
      }
    } catch (error) {
      throw toWriteError(filePath, error)
    }
  }

  private async deleteFiles(domain: string): Promise<boolean> {
    let removed = false
    for (const filePath of Object.values(this.paths(domain))) {
      let present: boolean
      try {
        present = await exists(filePath)
      } catch (error) {
        throw toWriteError(filePath, error)
      }
      if (present) {
        await this.removeEntry(filePath)
        removed = true
      }
    }
    return removed
  }
}
