/**
 * Positional runner: <domain> <port> [setup|remove|check]
 * The action defaults to setup. The port is only used by setup.
 */

import { formatError } from "@sslctl/shared"
import { checkCommand, type CliIo, consoleIo, removeCommand, setupCommand } from "./commands.js"
import type { CliDeps } from "./program.js"

const ACTIONS = ["setup", "remove", "check"] as const
type Action = (typeof ACTIONS)[number]

function isAction(value: string): value is Action {
  return ACTIONS.some(action => action === value)
}

function printUsage(io: CliIo): void {
  io.err("Usage: sslctl-run <domain> <port> [setup|remove|check]")
  io.err("Example: sslctl-run example.com 3000 setup")
  io.err("Example: sslctl-run example.com 3000 remove")
  io.err("Example: sslctl-run example.com 3000 check")
}

export async function runPositional(argv: string[], deps: CliDeps): Promise<number> {
  const io = deps.io ?? consoleIo

  if (argv.length < 2) {
    printUsage(io)
    return 1
  }

  const [rawDomain, port, rawAction = "setup"] = argv
  const domain = rawDomain.toLowerCase()
  const action = rawAction.toLowerCase()

  if (!isAction(action)) {
    io.err(`❌ Unknown action: ${rawAction}`)
    io.err(`Available actions: ${ACTIONS.join(", ")}`)
    return 1
  }

  io.out(`🔧 Domain: ${domain}`)
  io.out(`📡 Port: ${port}`)
  io.out(`⚡ Action: ${action}`)

  try {
    const ops = deps.createOperations(deps.loadConfig())
    switch (action) {
      case "setup":
        return await setupCommand(ops, io, domain, port, { sslRedirect: true, testPort: false })
      case "remove":
        return await removeCommand(ops, io, domain)
      case "check":
        return await checkCommand(ops, io, domain)
    }
  } catch (error) {
    io.err(`❌ Unexpected error: ${formatError(error)}`)
    return 1
  }
}
