import { describe, expect, it } from "vitest"
import { SslError } from "../errors.js"
import { isValidDomain, isValidPort, validateDomain, validatePort } from "../validation.js"

describe("validateDomain", () => {
  it.each([
    ["example.com", "example.com"],
    ["Example.COM", "example.com"],
    ["sub.domain.example.co.uk", "sub.domain.example.co.uk"],
    ["my-app.example.com", "my-app.example.com"],
    ["a1.b2.io", "a1.b2.io"],
    ["xn--bcher-kva.example", "xn--bcher-kva.example"],
    ["expired-cert.test", "expired-cert.test"],
  ])("accepts %s as %s", (input, expected) => {
    expect(validateDomain(input)).toBe(expected)
  })

  it("accepts a 63-character label", () => {
    const label = "a".repeat(63)
    expect(validateDomain(`${label}.com`)).toBe(`${label}.com`)
  })

  it.each([
    ["empty", ""],
    ["leading hyphen", "-bad.com"],
    ["trailing hyphen in label", "bad-.com"],
    ["hyphen before dot in later label", "good.bad-.com"],
    ["consecutive dots", "bad..com"],
    ["leading dot", ".example.com"],
    ["trailing dot", "example.com."],
    ["space inside", "exa mple.com"],
    ["surrounding whitespace", " example.com"],
    ["single label", "localhost"],
    ["numeric tld", "example.123"],
    ["underscore", "my_site.com"],
    ["path traversal", "../etc/passwd"],
    ["slash", "example.com/evil"],
    ["64-character label", `${"a".repeat(64)}.com`],
  ])("rejects %s", (_name, input) => {
    expect(() => validateDomain(input)).toThrow(SslError)
    expect(isValidDomain(input)).toBe(false)
  })

  it("throws INVALID_DOMAIN with a readable message", () => {
    expect(() => validateDomain("-bad.com")).toThrow(
      expect.objectContaining({
        code: "INVALID_DOMAIN",
        message: "Invalid domain name: '-bad.com'. Please enter it in the format 'example.com'.",
      }),
    )
  })

  it("rejects names longer than 253 characters", () => {
    const name = `${Array.from({ length: 5 }, () => "a".repeat(60)).join(".")}.com`
    expect(name.length).toBeGreaterThan(253)
    expect(isValidDomain(name)).toBe(false)
  })
})

describe("validatePort", () => {
  it.each([1, 80, 3000, 65535])("accepts %d", port => {
    expect(validatePort(port)).toBe(port)
  })

  it("accepts decimal strings", () => {
    expect(validatePort("3000")).toBe(3000)
    expect(validatePort("1")).toBe(1)
  })

  it.each([0, -1, 65536, 3000.5, Number.NaN, Number.POSITIVE_INFINITY])("rejects %d", port => {
    expect(() => validatePort(port)).toThrow(SslError)
    expect(isValidPort(port)).toBe(false)
  })

  it.each(["", "abc", "30a", "-1", "3e3", "1.5", " 80"])("rejects string %j", value => {
    expect(isValidPort(value)).toBe(false)
  })

  it("throws INVALID_PORT", () => {
    expect(() => validatePort(70000)).toThrow(
      expect.objectContaining({
        code: "INVALID_PORT",
        message: "Invalid port: '70000'. Expected an integer between 1 and 65535.",
      }),
    )
  })
})
