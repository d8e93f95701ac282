/**
 * Input validation for domain names and forwarded ports
 *
 * Pure functions, no side effects. Successful results are zod-branded so a
 * value that has been through validation can be told apart from a raw string
 * or number at the type level.
 */

import { z } from "zod"
import { SslError } from "./errors.js"

const LABEL = "[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?"

/**
 * Dot-separated labels of 1-63 characters, no leading/trailing hyphen per label,
 * ending in an alphabetic top-level label of at least two characters.
 */
export const HOSTNAME_PATTERN = new RegExp(`^(?:${LABEL}\\.)+[a-z]{2,63}$`)

export const domainSchema = z
  .string()
  .toLowerCase()
  .min(1)
  .max(253)
  .regex(HOSTNAME_PATTERN)
  .brand<"Domain">()

export type Domain = z.infer<typeof domainSchema>

export const portSchema = z
  .union([z.number(), z.string().regex(/^\d+$/).transform(Number)])
  .pipe(z.number().int().min(1).max(65535))
  .brand<"Port">()

export type Port = z.infer<typeof portSchema>

/**
 * Validate and normalise a domain name.
 *
 * @throws SslError INVALID_DOMAIN
 */
export function validateDomain(name: string): Domain {
  const result = domainSchema.safeParse(name)
  if (!result.success) {
    throw SslError.invalidDomain(name)
  }
  return result.data
}

/**
 * Validate a forwarded port. Accepts numbers and strings of decimal digits.
 *
 * @throws SslError INVALID_PORT
 */
export function validatePort(value: number | string): Port {
  const result = portSchema.safeParse(value)
  if (!result.success) {
    throw SslError.invalidPort(value)
  }
  return result.data
}

export function isValidDomain(name: string): boolean {
  return domainSchema.safeParse(name).success
}

export function isValidPort(value: number | string): boolean {
  return portSchema.safeParse(value).success
}
