import { mkdtempSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import { createConfig, describeConfig, loadConfig, loadEnvFile } from "../config.js"

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    const config = loadConfig({})

    expect(config.nginx).toEqual({
      sitesAvailable: "/etc/nginx/sites-available",
      sitesEnabled: "/etc/nginx/sites-enabled",
      serviceName: "nginx",
    })
    expect(config.letsencrypt).toEqual({
      emailDomain: "",
      webroot: "/var/www/html",
      liveDir: "/etc/letsencrypt/live",
      challenge: "webroot",
    })
    expect(config.tls).toEqual({ protocols: "TLSv1.2 TLSv1.3", ciphers: "HIGH:!aNULL:!MD5" })
    expect(config.ports).toEqual({ http: 80, https: 443 })
    expect(config.commands).toEqual({ sudo: "sudo", packageManager: "apt-get", serviceControl: "systemctl" })
    expect(config.timeouts).toEqual({ portTestSeconds: 10, commandSeconds: 300 })
    expect(config.expirySource).toBe("file")
    expect(config.logLevel).toBe("info")
  })

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      NGINX_SITES_AVAILABLE: "/tmp/avail",
      DEFAULT_HTTPS_PORT: "8443",
      LETSENCRYPT_EMAIL_DOMAIN: "ops.example.org",
      CERTBOT_CHALLENGE: "nginx",
      SUDO_COMMAND: "",
      EXPIRY_CHECK_SOURCE: "live",
      LOG_LEVEL: "debug",
    })

    expect(config.nginx.sitesAvailable).toBe("/tmp/avail")
    expect(config.ports.https).toBe(8443)
    expect(config.letsencrypt.emailDomain).toBe("ops.example.org")
    expect(config.letsencrypt.challenge).toBe("nginx")
    expect(config.commands.sudo).toBe("")
    expect(config.expirySource).toBe("live")
    expect(config.logLevel).toBe("debug")
  })

  it("ignores unrelated variables", () => {
    expect(() => loadConfig({ PATH: "/usr/bin", HOME: "/root" })).not.toThrow()
  })

  it("fails fast on an invalid port", () => {
    expect(() => loadConfig({ DEFAULT_HTTP_PORT: "99999" })).toThrow(/^FATAL: Invalid configuration - DEFAULT_HTTP_PORT/)
  })

  it("fails fast on an unknown enum value", () => {
    expect(() => loadConfig({ CERTBOT_CHALLENGE: "dns" })).toThrow(/CERTBOT_CHALLENGE/)
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(/LOG_LEVEL/)
  })

  it("rejects an email domain with an @ in it", () => {
    expect(() => loadConfig({ LETSENCRYPT_EMAIL_DOMAIN: "me@example.com" })).toThrow(/LETSENCRYPT_EMAIL_DOMAIN/)
  })

  it("returns a frozen object", () => {
    const config = loadConfig({})
    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.nginx)).toBe(true)
    expect(Object.isFrozen(config.timeouts)).toBe(true)
  })
})

describe("createConfig", () => {
  it("accepts typed overrides", () => {
    const config = createConfig({ DEFAULT_HTTP_PORT: 8080, PORT_TEST_TIMEOUT: 2 })
    expect(config.ports.http).toBe(8080)
    expect(config.timeouts.portTestSeconds).toBe(2)
  })

  it("does not read process.env", () => {
    const previous = process.env.NGINX_SERVICE
    process.env.NGINX_SERVICE = "openresty"
    try {
      expect(createConfig().nginx.serviceName).toBe("nginx")
    } finally {
      if (previous === undefined) {
        delete process.env.NGINX_SERVICE
      } else {
        process.env.NGINX_SERVICE = previous
      }
    }
  })
})

describe("describeConfig", () => {
  it("lists every setting in display order", () => {
    const rows = describeConfig(createConfig())
    expect(rows.map(row => row.label)).toEqual([
      "Nginx sites-available",
      "Nginx sites-enabled",
      "Nginx service",
      "Let's Encrypt email domain",
      "Webroot path",
      "Certificate live dir",
      "Challenge method",
      "SSL protocols",
      "SSL ciphers",
      "Default HTTP port",
      "Default HTTPS port",
      "Sudo command",
      "Package manager",
      "System control",
      "Port test timeout",
      "Command timeout",
      "Expiry check source",
      "Log level",
    ])
  })

  it("renders placeholders and units", () => {
    const rows = describeConfig(createConfig({ SUDO_COMMAND: "" }))
    const value = (label: string) => rows.find(row => row.label === label)?.value

    expect(value("Let's Encrypt email domain")).toBe("(domain being provisioned)")
    expect(value("Sudo command")).toBe("(disabled)")
    expect(value("Port test timeout")).toBe("10 seconds")
    expect(value("Command timeout")).toBe("300 seconds")
    expect(value("Default HTTPS port")).toBe("443")
  })
})

describe("loadEnvFile", () => {
  let dir: string | undefined

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true })
    dir = undefined
    delete process.env.SSLCTL_TEST_ONLY_VALUE
  })

  it("returns false when the file does not exist", () => {
    dir = mkdtempSync(join(tmpdir(), "sslctl-env-"))
    expect(loadEnvFile(join(dir, "missing.env"))).toBe(false)
  })

  it("loads variables into process.env", () => {
    dir = mkdtempSync(join(tmpdir(), "sslctl-env-"))
    const path = join(dir, ".env")
    writeFileSync(path, "SSLCTL_TEST_ONLY_VALUE=from-file\n")

    expect(loadEnvFile(path)).toBe(true)
    expect(process.env.SSLCTL_TEST_ONLY_VALUE).toBe("from-file")
  })

  it("keeps values already present in the environment", () => {
    dir = mkdtempSync(join(tmpdir(), "sslctl-env-"))
    const path = join(dir, ".env")
    writeFileSync(path, "SSLCTL_TEST_ONLY_VALUE=from-file\n")
    process.env.SSLCTL_TEST_ONLY_VALUE = "from-shell"

    loadEnvFile(path)
    expect(process.env.SSLCTL_TEST_ONLY_VALUE).toBe("from-shell")
  })
})
