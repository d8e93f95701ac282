import { mkdtempSync, rmSync } from "node:fs"
import { tmpdir } from "node:os"
import path from "node:path"
import { createConfig, type EnvInput, type SslConfig } from "@sslctl/shared"
import type { CommandError, CommandResult, CommandRunner, RunOptions } from "../src/executors/common.js"

export interface RecordedCall {
  command: string
  args: string[]
  options: RunOptions
  /** command and args joined with spaces */
  line: string
}

type Outcome = Partial<CommandResult> | CommandError

interface Rule {
  match: string | RegExp
  respond: (call: RecordedCall) => Outcome
  once: boolean
}

/**
 * In-memory CommandRunner. Every call is recorded; the first matching rule decides
 * the result, otherwise the command "succeeds" with empty output.
 * String rules match a prefix of the joined command line.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = []
  private readonly rules: Rule[] = []

  on(match: string | RegExp, outcome: Outcome): this {
    this.rules.push({ match, respond: () => outcome, once: false })
    return this
  }

  once(match: string | RegExp, outcome: Outcome): this {
    this.rules.push({ match, respond: () => outcome, once: true })
    return this
  }

  /** Decide the outcome from the call itself */
  respond(match: string | RegExp, respond: (call: RecordedCall) => Outcome): this {
    this.rules.push({ match, respond, once: false })
    return this
  }

  lines(): string[] {
    return this.calls.map(call => call.line)
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const call: RecordedCall = { command, args, options, line: [command, ...args].join(" ") }
    this.calls.push(call)

    const index = this.rules.findIndex(rule =>
      typeof rule.match === "string" ? call.line.startsWith(rule.match) : rule.match.test(call.line),
    )
    if (index === -1) {
      return { exitCode: 0, stdout: "", stderr: "" }
    }

    const rule = this.rules[index]
    if (rule.once) {
      this.rules.splice(index, 1)
    }

    const outcome = rule.respond(call)
    if (outcome instanceof Error) {
      throw outcome
    }
    return { exitCode: 0, stdout: "", stderr: "", ...outcome }
  }
}

export interface TempEnv {
  root: string
  config: SslConfig
  cleanup: () => void
}

/**
 * Configuration whose nginx directories live under a fresh temp directory.
 * Sudo is off so site files are written directly.
 */
export function createTempEnv(overrides: EnvInput = {}): TempEnv {
  const root = mkdtempSync(path.join(tmpdir(), "sslctl-test-"))
  const config = createConfig({
    NGINX_SITES_AVAILABLE: path.join(root, "sites-available"),
    NGINX_SITES_ENABLED: path.join(root, "sites-enabled"),
    LETSENCRYPT_WEBROOT: path.join(root, "webroot"),
    LETSENCRYPT_LIVE_DIR: path.join(root, "live"),
    LOG_LEVEL: "error",
    SUDO_COMMAND: "",
    ...overrides,
  })
  return {
    root,
    config,
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  }
}
