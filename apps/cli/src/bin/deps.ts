import { createLogger, loadConfig, loadEnvFile } from "@sslctl/shared"
import { SslOrchestrator } from "@sslctl/site-controller"
import type { CliDeps } from "../program.js"

/**
 * Production wiring: .env + environment, real subprocesses, console logging
 */
export function createDefaultDeps(): CliDeps {
  loadEnvFile()
  return {
    loadConfig: () => loadConfig(),
    createOperations: config =>
      new SslOrchestrator({ config, logger: createLogger({ level: config.logLevel }) }),
  }
}

export function exitOnInterrupt(): void {
  process.on("SIGINT", () => {
    console.error("\n❌ Operation cancelled by user")
    process.exit(1)
  })
}
