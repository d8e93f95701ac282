import { describeConfig, type SslConfig } from "@sslctl/shared"
import type { RemoveOptions, SetupOptions, SslOrchestrator } from "@sslctl/site-controller"

/** The orchestrator operations the CLI drives */
export type CliOperations = Pick<SslOrchestrator, "setup" | "remove" | "check">

export interface CliIo {
  out: (line: string) => void
  err: (line: string) => void
}

export const consoleIo: CliIo = {
  out: line => console.log(line),
  err: line => console.error(line),
}

const RULE = "-".repeat(50)

export async function setupCommand(
  ops: CliOperations,
  io: CliIo,
  domain: string,
  port: string,
  options: SetupOptions,
): Promise<number> {
  io.out(`🚀 Setting up SSL certificate for ${domain}`)
  io.out(`📡 Forwarding traffic to port ${port}`)
  io.out(RULE)

  const result = await ops.setup(domain, port, options)

  for (const warning of result.warnings) {
    io.out(`⚠️  ${warning}`)
  }

  if (!result.success) {
    io.err(`❌ Error: ${result.error}`)
    if (result.rolledBack) {
      io.err("↩️  The nginx configuration written during setup has been rolled back")
    }
    return 1
  }

  io.out("✅ SSL certificate setup successful!")
  io.out(`🌐 Your site is now available at: https://${result.domain}`)
  if (result.configPath) {
    io.out(`📄 Configuration: ${result.configPath}`)
  }
  return 0
}

export async function removeCommand(
  ops: CliOperations,
  io: CliIo,
  domain: string,
  options: RemoveOptions = {},
): Promise<number> {
  io.out(`🗑️  Removing SSL configuration for ${domain}`)
  io.out(RULE)

  const result = await ops.remove(domain, options)
  if (!result.success) {
    io.err(`❌ Error: ${result.error}`)
    return 1
  }

  io.out(`✅ ${result.message}`)
  return 0
}

export async function checkCommand(ops: CliOperations, io: CliIo, domain: string): Promise<number> {
  io.out(`🔍 Checking SSL certificate expiry for ${domain}`)
  io.out(RULE)

  const result = await ops.check(domain)
  if (!result.success) {
    io.err(`❌ Error: ${result.error}`)
    return 1
  }

  if (result.isActive) {
    io.out("✅ SSL certificate is active and valid")
    io.out(`📅 Expires: ${result.notAfter} (${result.daysRemaining} days remaining)`)
  } else {
    io.out("⚠️  SSL certificate has expired")
    io.out(`📅 Expired: ${result.notAfter}`)
  }
  return 0
}

export function configCommand(config: SslConfig, io: CliIo): number {
  io.out("🔧 Current Configuration:")
  io.out("=".repeat(50))
  for (const { label, value } of describeConfig(config)) {
    io.out(`${label}: ${value}`)
  }
  return 0
}
