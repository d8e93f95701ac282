import { formatError, type SslConfig } from "@sslctl/shared"
import { Command, CommanderError } from "commander"
import {
  checkCommand,
  type CliIo,
  type CliOperations,
  configCommand,
  consoleIo,
  removeCommand,
  setupCommand,
} from "./commands.js"

export interface CliDeps {
  /** Read lazily so `--help` works with a broken environment */
  loadConfig: () => SslConfig
  createOperations: (config: SslConfig) => CliOperations
  io?: CliIo
}

const EXAMPLES = `
Examples:
  sslctl setup example.com 3000
  sslctl setup example.com 3000 --no-redirect --test-port
  sslctl remove example.com
  sslctl check example.com
  sslctl config`

export function createProgram(deps: CliDeps, onExitCode: (code: number) => void): Command {
  const io = deps.io ?? consoleIo
  const operations = () => deps.createOperations(deps.loadConfig())

  const program = new Command("sslctl")
    .description("Automated SSL certificate management for nginx using Let's Encrypt")
    .exitOverride()
    .configureOutput({
      writeOut: text => io.out(text.trimEnd()),
      writeErr: text => io.err(text.trimEnd()),
    })
    .addHelpText("after", EXAMPLES)

  program
    .command("setup")
    .description("Set up an SSL certificate for a domain")
    .argument("<domain>", "domain name to set up SSL for (e.g. example.com)")
    .argument("<port>", "local port to forward traffic to (e.g. 3000)")
    .option("--no-redirect", "don't redirect HTTP to HTTPS")
    .option("--test-port", "test port connectivity before setup", false)
    .action(async (domain: string, port: string, options: { redirect: boolean; testPort: boolean }) => {
      onExitCode(
        await setupCommand(operations(), io, domain, port, {
          sslRedirect: options.redirect,
          testPort: options.testPort,
        }),
      )
    })

  program
    .command("remove")
    .description("Remove the SSL configuration for a domain")
    .argument("<domain>", "domain name to remove SSL from")
    .option("--delete-certificate", "also delete the certificate from certbot's storage", false)
    .action(async (domain: string, options: { deleteCertificate: boolean }) => {
      onExitCode(await removeCommand(operations(), io, domain, { deleteCertificate: options.deleteCertificate }))
    })

  program
    .command("check")
    .description("Check SSL certificate expiry")
    .argument("<domain>", "domain name to check SSL expiry for")
    .action(async (domain: string) => {
      onExitCode(await checkCommand(operations(), io, domain))
    })

  program
    .command("config")
    .description("Show the current configuration")
    .action(() => {
      onExitCode(configCommand(deps.loadConfig(), io))
    })

  return program
}

/**
 * Parse and run one invocation
 *
 * @param argv - arguments after the executable and script name
 * @returns process exit code (0 for success, 1 for failure)
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const io = deps.io ?? consoleIo
  let exitCode: number | undefined
  const program = createProgram(deps, code => {
    exitCode = code
  })

  try {
    await program.parseAsync(argv, { from: "user" })
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 1
    }
    io.err(`❌ Unexpected error: ${formatError(error)}`)
    return 1
  }

  if (exitCode === undefined) {
    program.outputHelp({ error: true })
    return 1
  }
  return exitCode
}
