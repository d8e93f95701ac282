import { createConfig, type SslConfig } from "@sslctl/shared"
import type { ExpiryResult, RemoveResult, SetupResult } from "@sslctl/site-controller"
import { vi } from "vitest"
import type { CliIo, CliOperations } from "../src/commands.js"
import type { CliDeps } from "../src/program.js"

export interface CapturedIo extends CliIo {
  stdout: string[]
  stderr: string[]
}

export function captureIo(): CapturedIo {
  const stdout: string[] = []
  const stderr: string[] = []
  return {
    stdout,
    stderr,
    out: line => stdout.push(line),
    err: line => stderr.push(line),
  }
}

export function fakeOperations(results: {
  setup?: Partial<SetupResult>
  remove?: Partial<RemoveResult>
  check?: Partial<ExpiryResult>
} = {}) {
  return {
    setup: vi.fn(
      async (domain: string, port: number | string): Promise<SetupResult> => ({
        success: true,
        domain,
        port: Number(port),
        configPath: `/etc/nginx/sites-available/${domain}.conf`,
        warnings: [],
        message: `Your site is now available at: https://${domain}`,
        ...results.setup,
      }),
    ),
    remove: vi.fn(
      async (domain: string): Promise<RemoveResult> => ({
        success: true,
        domain,
        removed: true,
        certificateDeleted: false,
        message: `Domain ${domain} has been removed from nginx.`,
        ...results.remove,
      }),
    ),
    check: vi.fn(
      async (domain: string): Promise<ExpiryResult> => ({
        success: true,
        domain,
        isActive: true,
        notAfter: "2025-01-05T12:00:00.000Z",
        daysRemaining: 4,
        ...results.check,
      }),
    ),
  } satisfies CliOperations
}

export function fakeDeps(ops: CliOperations, io: CliIo, config: SslConfig = createConfig()) {
  return {
    loadConfig: vi.fn(() => config),
    createOperations: vi.fn((_config: SslConfig) => ops),
    io,
  } satisfies CliDeps
}
