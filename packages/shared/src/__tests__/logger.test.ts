import { afterEach, describe, expect, it, vi } from "vitest"
import { consoleSink, createLogger, type LogEntry } from "../logger.js"

function capture() {
  const entries: LogEntry[] = []
  return { entries, sink: (entry: LogEntry) => entries.push(entry) }
}

describe("createLogger", () => {
  it("drops entries below the configured level", () => {
    const { entries, sink } = capture()
    const logger = createLogger({ level: "warn", sink })

    logger.debug("d")
    logger.info("i")
    logger.warn("w")
    logger.error("e")

    expect(entries.map(entry => entry.level)).toEqual(["warn", "error"])
  })

  it("defaults to info", () => {
    const { entries, sink } = capture()
    const logger = createLogger({ sink })

    logger.debug("hidden")
    logger.info("shown")

    expect(entries).toHaveLength(1)
    expect(entries[0]?.message).toBe("shown")
    expect(entries[0]?.scope).toBe("sslctl")
  })

  it("carries error and context", () => {
    const { entries, sink } = capture()
    const failure = new Error("boom")
    createLogger({ sink }).error("setup failed", failure, { domain: "example.com", phase: "cert-issue" })

    expect(entries[0]).toMatchObject({
      level: "error",
      message: "setup failed",
      error: failure,
      context: { domain: "example.com", phase: "cert-issue" },
    })
    expect(Number.isNaN(Date.parse(entries[0]?.timestamp ?? ""))).toBe(false)
  })

  it("nests child scopes and keeps the level", () => {
    const { entries, sink } = capture()
    const child = createLogger({ scope: "root", level: "info", sink }).child("nginx").child("reload")

    child.debug("hidden")
    child.info("reloaded")

    expect(entries).toHaveLength(1)
    expect(entries[0]?.scope).toBe("root:nginx:reload")
  })
})

describe("consoleSink", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  const entry = (overrides: Partial<LogEntry>): LogEntry => ({
    level: "info",
    scope: "sslctl",
    message: "hello",
    timestamp: "2025-01-01T00:00:00.000Z",
    ...overrides,
  })

  it("writes info to stdout", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {})
    const error = vi.spyOn(console, "error").mockImplementation(() => {})

    consoleSink(entry({}))

    expect(log).toHaveBeenCalledWith("[sslctl] hello")
    expect(error).not.toHaveBeenCalled()
  })

  it("writes warnings to stderr with the error message", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {})

    consoleSink(entry({ level: "warn", message: "install failed", error: new Error("exit 100") }))

    expect(error).toHaveBeenCalledWith("[sslctl] install failed: exit 100")
  })

  it("stringifies non-Error values", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {})

    consoleSink(entry({ level: "error", message: "odd", error: 42 }))

    expect(error).toHaveBeenCalledWith("[sslctl] odd: 42")
  })
})
