import { spawn } from "node:child_process"
import { extractErrorCode, type Logger, silentLogger } from "@sslctl/shared"

export interface RunOptions {
  /** Prefix the command with the configured privilege-escalation command */
  sudo?: boolean
  /** Written to the child's stdin, which is then closed */
  input?: string
  timeoutMs?: number
}

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

/**
 * The subprocess boundary. Every external tool is reached through this interface
 * so the orchestration can be exercised without touching the host.
 */
export interface CommandRunner {
  /**
   * Run a command to completion. Resolves for any exit code.
   *
   * @throws CommandError when the command cannot be started or times out
   */
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>
}

/**
 * Error thrown when a command cannot be run or exits unsuccessfully
 */
export class CommandError extends Error {
  constructor(
    public command: string,
    public exitCode: number,
    public stderr: string,
    public stdout: string,
    /** errno of a failed spawn, e.g. ENOENT when the binary is not installed */
    public spawnCode?: string,
  ) {
    super(
      spawnCode
        ? `Failed to start ${command}: ${spawnCode}`
        : `Command ${command} failed with exit code ${exitCode}${stderr ? `: ${stderr}` : ""}`,
    )
    this.name = "CommandError"
  }

  get notInstalled(): boolean {
    return this.spawnCode === "ENOENT"
  }
}

export interface ShellCommandRunnerOptions {
  /** Privilege-escalation command; empty string runs everything as the current user */
  sudoCommand: string
  /** Default timeout for every command */
  timeoutMs?: number
  logger?: Logger
}

/**
 * CommandRunner backed by child_process.spawn (no shell, arguments passed verbatim)
 */
export class ShellCommandRunner implements CommandRunner {
  private readonly sudoCommand: string
  private readonly timeoutMs?: number
  private readonly logger: Logger

  constructor(options: ShellCommandRunnerOptions) {
    this.sudoCommand = options.sudoCommand
    this.timeoutMs = options.timeoutMs
    this.logger = options.logger ?? silentLogger
  }

  run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const [file, argv]: [string, string[]] =
      options.sudo && this.sudoCommand ? [this.sudoCommand, [command, ...args]] : [command, args]
    const label = [file, ...argv].join(" ")
    const timeoutMs = options.timeoutMs ?? this.timeoutMs

    this.logger.debug(`$ ${label}`)

    return new Promise((resolve, reject) => {
      const proc = spawn(file, argv, {
        stdio: [options.input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
        env: process.env,
      })

      let stdout = ""
      let stderr = ""
      let timedOut = false

      const timer =
        timeoutMs === undefined
          ? undefined
          : setTimeout(() => {
              timedOut = true
              proc.kill("SIGTERM")
            }, timeoutMs)

      proc.stdout?.on("data", (data: Buffer) => {
        stdout += data.toString()
      })

      proc.stderr?.on("data", (data: Buffer) => {
        stderr += data.toString()
      })

      if (options.input !== undefined && proc.stdin) {
        // The child may exit without draining stdin (EPIPE); its exit code still decides the outcome
        proc.stdin.on("error", err => this.logger.debug(`stdin of ${label} closed early: ${err.message}`))
        proc.stdin.end(options.input)
      }

      proc.on("close", code => {
        if (timer) clearTimeout(timer)
        if (timedOut) {
          reject(new CommandError(label, code ?? 1, `Timed out after ${timeoutMs}ms`, stdout.trim()))
          return
        }
        resolve({ exitCode: code ?? 1, stdout: stdout.trim(), stderr: stderr.trim() })
      })

      proc.on("error", err => {
        if (timer) clearTimeout(timer)
        reject(new CommandError(label, 127, err.message, "", extractErrorCode(err) ?? "ESPAWN"))
      })
    })
  }
}

/**
 * Run a command and return its stdout
 *
 * @throws CommandError if the command exits with a non-zero code
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: RunOptions,
): Promise<string> {
  const result = await runner.run(command, args, options)
  if (result.exitCode !== 0) {
    throw new CommandError([command, ...args].join(" "), result.exitCode, result.stderr, result.stdout)
  }
  return result.stdout
}
