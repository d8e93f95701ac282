import type { Logger, SslConfig } from "@sslctl/shared"
import { CommandError, type CommandRunner } from "./common.js"

export interface ToolSpec {
  binary: string
  packageName: string
  displayName: string
}

export const TOOLS = {
  nginx: { binary: "nginx", packageName: "nginx", displayName: "Nginx" },
  certbot: { binary: "certbot", packageName: "certbot", displayName: "Certbot" },
  openssl: { binary: "openssl", packageName: "openssl", displayName: "OpenSSL" },
} as const satisfies Record<string, ToolSpec>

export type ToolName = keyof typeof TOOLS

export interface ToolDeps {
  runner: CommandRunner
  config: SslConfig
  logger: Logger
}

export interface RequiredToolsReport {
  /** Tools still absent after the install attempt */
  missing: ToolSpec[]
  /** Tools that were absent and got installed during this run */
  installed: ToolSpec[]
}

/**
 * Check whether a binary is on PATH (which-style lookup)
 */
export async function isToolInstalled(runner: CommandRunner, binary: string): Promise<boolean> {
  try {
    const result = await runner.run("which", [binary])
    return result.exitCode === 0
  } catch (error) {
    if (error instanceof CommandError) return false
    throw error
  }
}

/**
 * Install a package through the configured package manager.
 * Failures are logged; the caller re-checks presence afterwards.
 */
async function installTool(tool: ToolSpec, deps: ToolDeps): Promise<void> {
  const { runner, config, logger } = deps
  const pm = config.commands.packageManager

  logger.info(`${tool.displayName} not found, installing with ${pm}...`)
  const steps: string[][] = [["update"], ["install", "-y", tool.packageName]]

  for (const args of steps) {
    try {
      const result = await runner.run(pm, args, { sudo: true })
      if (result.exitCode !== 0) {
        logger.warn(`${pm} ${args.join(" ")} exited with code ${result.exitCode}`, result.stderr || undefined)
        return
      }
    } catch (error) {
      logger.warn(`${pm} ${args.join(" ")} could not be run`, error)
      return
    }
  }
}

type ToolStatus = "present" | "installed" | "missing"

async function provisionTool(spec: ToolSpec, deps: ToolDeps): Promise<ToolStatus> {
  if (await isToolInstalled(deps.runner, spec.binary)) {
    return "present"
  }

  await installTool(spec, deps)
  if (await isToolInstalled(deps.runner, spec.binary)) {
    return "installed"
  }
  deps.logger.error(`${spec.displayName} is still not available after the install attempt`)
  return "missing"
}

/**
 * Make sure a tool is installed, installing it when absent.
 *
 * @returns whether the tool is present after the attempt
 */
export async function ensureToolInstalled(tool: ToolName | ToolSpec, deps: ToolDeps): Promise<boolean> {
  const spec = typeof tool === "string" ? TOOLS[tool] : tool
  return (await provisionTool(spec, deps)) !== "missing"
}

/**
 * Check every tool in order; installs what is missing
 */
export async function ensureRequiredTools(tools: ToolName[], deps: ToolDeps): Promise<RequiredToolsReport> {
  const report: RequiredToolsReport = { missing: [], installed: [] }

  for (const name of tools) {
    const spec = TOOLS[name]
    const status = await provisionTool(spec, deps)
    if (status === "installed") report.installed.push(spec)
    if (status === "missing") report.missing.push(spec)
  }

  return report
}
