/**
 * JSON text for record values, keeping integers beyond 2^53 exact.
 * Such integers are held as bigint in memory and written back as bare digits.
 */
import * as yaml from "yaml"
import { randomUUID } from "node:crypto"

const isUnsafeInteger = (value: unknown): boolean =>
  typeof value === "number" &&
  Number.isInteger(value) &&
  !Number.isSafeInteger(value)

const containsUnsafeInteger = (value: unknown): boolean => {
  if (isUnsafeInteger(value)) return true
  if (Array.isArray(value)) return value.some(containsUnsafeInteger)
  if (value !== null && typeof value === "object") {
    return Object.values(value).some(containsUnsafeInteger)
  }
  return false
}

// Safe integers go back to plain numbers
const narrowIntegers = (value: unknown): unknown => {
  if (typeof value === "bigint") {
    const asNumber = Number(value)
    return Number.isSafeInteger(asNumber) ? asNumber : value
  }
  if (Array.isArray(value)) return value.map(narrowIntegers)
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, narrowIntegers(entry)])
    )
  }
  return value
}

/**
 * Parse JSON text. Throws SyntaxError on invalid JSON.
 */
export const parseJson = (text: string): unknown => {
  const parsed: unknown = JSON.parse(text)
  if (!containsUnsafeInteger(parsed)) {
    return parsed
  }

  // Valid JSON is valid YAML; the YAML parser can read its integers as bigint
  const exact: unknown = yaml.parse(text, { intAsBigInt: true, uniqueKeys: false })
  return narrowIntegers(exact)
}

/**
 * Serialize a value as JSON text. bigint values are written as integers.
 */
export const stringifyJson = (value: unknown, space?: number): string => {
  const marker = `bigint:${randomUUID()}:`
  const text = JSON.stringify(
    value,
    (_key, entry: unknown) =>
      typeof entry === "bigint" ? `${marker}${entry.toString()}` : entry,
    space
  )
  return text.replace(new RegExp(`"${marker}(-?\\d+)"`, "g"), "$1")
}
