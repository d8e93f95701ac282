/**
 * Function-call surface: one call per operation, configuration read from the
 * environment unless dependencies are supplied.
 */

import { loadConfig } from "@sslctl/shared"
import { type OrchestratorDeps, SslOrchestrator } from "./orchestrator.js"
import type { ExpiryResult, RemoveOptions, RemoveResult, SetupOptions, SetupResult } from "./types.js"

export type ApiDeps = Partial<OrchestratorDeps>

export function createOrchestrator(deps: ApiDeps = {}): SslOrchestrator {
  return new SslOrchestrator({ ...deps, config: deps.config ?? loadConfig() })
}

/**
 * Set up HTTPS for a domain with Let's Encrypt and nginx.
 *
 * @example
 * ```ts
 * const result = await setupSslCertificate("example.com", 3000, { sslRedirect: true })
 * if (!result.success) console.error(result.error)
 * ```
 */
export function setupSslCertificate(
  domain: string,
  port: number | string,
  options: SetupOptions = {},
  deps?: ApiDeps,
): Promise<SetupResult> {
  return createOrchestrator(deps).setup(domain, port, options)
}

export function removeSslCertificate(domain: string, options: RemoveOptions = {}, deps?: ApiDeps): Promise<RemoveResult> {
  return createOrchestrator(deps).remove(domain, options)
}

export function checkSslExpiry(domain: string, deps?: ApiDeps): Promise<ExpiryResult> {
  return createOrchestrator(deps).check(domain)
}
