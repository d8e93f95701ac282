/**
 * Site Controller - HTTPS termination for a domain in front of a local port
 *
 * Sequences nginx, certbot and openssl:
 * - Node.js (Brain): validation, state, error handling, orchestration, rollback
 * - External tools (Hands): package installs, service reloads, issuance, inspection
 *
 * @packageDocumentation
 */

export { SslOrchestrator } from "./orchestrator.js"
export type { OrchestratorDeps, OrchestratorInit } from "./orchestrator.js"
export { checkSslExpiry, createOrchestrator, removeSslCertificate, setupSslCertificate } from "./api.js"
export type { ApiDeps } from "./api.js"
export type {
  ExpiryResult,
  RemoveOptions,
  RemoveResult,
  SetupOptions,
  SetupPhase,
  SetupResult,
} from "./types.js"

// Re-export individual executors for advanced usage
export { CommandError, runChecked, ShellCommandRunner } from "./executors/common.js"
export type { CommandResult, CommandRunner, RunOptions } from "./executors/common.js"
export { ensureRequiredTools, ensureToolInstalled, isToolInstalled, TOOLS } from "./executors/tools.js"
export type { RequiredToolsReport, ToolName, ToolSpec } from "./executors/tools.js"
export { NginxSiteManager } from "./executors/nginx.js"
export type { SiteConfigPaths, SiteSnapshot, WriteSiteConfigOptions } from "./executors/nginx.js"
export {
  certificatePaths,
  renderFinalSiteConfig,
  renderInitialSiteConfig,
  renderSiteConfig,
} from "./executors/nginx-template.js"
export type { SiteConfigStage, SiteTemplateParams } from "./executors/nginx-template.js"
export { deleteCertificate, issueCertificate, registrationEmail } from "./executors/certbot.js"
export type { IssueCertificateParams, IssueCertificateResult } from "./executors/certbot.js"
export { probePort, testPortReachable } from "./executors/port.js"
export type { PortProbeResult } from "./executors/port.js"
export { parseNotAfter, readCertificateExpiry } from "./executors/openssl.js"
