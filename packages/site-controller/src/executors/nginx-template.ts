/**
 * Nginx site configuration renderers
 *
 * Two shapes per domain:
 * - initial: HTTP only, serves the ACME webroot challenge and proxies everything else
 * - final: HTTP block (redirect or proxy) plus the HTTPS block using the issued certificate
 */

import type { SslConfig } from "@sslctl/shared"

export type SiteConfigStage = "initial" | "final"

export interface SiteTemplateParams {
  domain: string
  port: number
  /** Final stage only: answer plain HTTP with a 301 to HTTPS */
  redirect?: boolean
}

const INDENT = "    "

function indent(lines: string[], depth = 1): string[] {
  return lines.map(line => (line ? `${INDENT.repeat(depth)}${line}` : line))
}

function block(header: string, body: string[]): string[] {
  return [`${header} {`, ...indent(body), "}"]
}

function listen(port: number, ssl = false): string[] {
  const suffix = ssl ? " ssl" : ""
  return [`listen ${port}${suffix};`, `listen [::]:${port}${suffix};`]
}

function acmeChallengeLocation(webroot: string): string[] {
  return block("location /.well-known/acme-challenge/", [`root ${webroot};`])
}

function proxyLocation(port: number): string[] {
  return block("location /", [
    `proxy_pass http://127.0.0.1:${port};`,
    "proxy_set_header Host $host;",
    "proxy_set_header X-Real-IP $remote_addr;",
    "proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;",
    "proxy_set_header X-Forwarded-Proto $scheme;",
  ])
}

function header(domain: string, stage: SiteConfigStage): string[] {
  return [`# Managed by sslctl - ${stage} configuration for ${domain}`, "# Changes are overwritten on the next setup", ""]
}

export function certificatePaths(domain: string, liveDir: string) {
  const dir = `${liveDir}/${domain}`
  return {
    fullchain: `${dir}/fullchain.pem`,
    privkey: `${dir}/privkey.pem`,
    chain: `${dir}/chain.pem`,
  }
}

export function renderInitialSiteConfig(params: SiteTemplateParams, config: SslConfig): string {
  const { domain, port } = params
  const lines = [
    ...header(domain, "initial"),
    ...block("server", [
      ...listen(config.ports.http),
      `server_name ${domain};`,
      "",
      ...acmeChallengeLocation(config.letsencrypt.webroot),
      "",
      ...proxyLocation(port),
    ]),
  ]
  return `${lines.join("\n")}\n`
}

export function renderFinalSiteConfig(params: SiteTemplateParams, config: SslConfig): string {
  const { domain, port, redirect = true } = params
  const certs = certificatePaths(domain, config.letsencrypt.liveDir)

  const httpBody = redirect
    ? [...listen(config.ports.http), `server_name ${domain};`, "", "return 301 https://$host$request_uri;"]
    : [
        ...listen(config.ports.http),
        `server_name ${domain};`,
        "",
        ...acmeChallengeLocation(config.letsencrypt.webroot),
        "",
        ...proxyLocation(port),
      ]

  const httpsBody = [
    ...listen(config.ports.https, true),
    `server_name ${domain};`,
    "",
    `ssl_certificate ${certs.fullchain};`,
    `ssl_certificate_key ${certs.privkey};`,
    `ssl_trusted_certificate ${certs.chain};`,
    `ssl_protocols ${config.tls.protocols};`,
    `ssl_ciphers ${config.tls.ciphers};`,
    "",
    ...proxyLocation(port),
  ]

  const lines = [...header(domain, "final"), ...block("server", httpBody), "", ...block("server", httpsBody)]
  return `${lines.join("\n")}\n`
}

export function renderSiteConfig(stage: SiteConfigStage, params: SiteTemplateParams, config: SslConfig): string {
  return stage === "initial" ? renderInitialSiteConfig(params, config) : renderFinalSiteConfig(params, config)
}
