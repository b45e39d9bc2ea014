import { CoercionError } from "./errors"
import type { ValueSource } from "./value-source"

const FALSE_WORDS: ReadonlySet<string> = new Set(["0", "f", "false", "n", "no"])

const INTEGER_PATTERN = /^[+-]?\d+$/

/**
 * Parses a base-10 signed integer within the safe integer range.
 *
 * @throws CoercionError naming the source and key
 */
export function coerceInteger(raw: string, source: ValueSource, key: string): number {
  const value = INTEGER_PATTERN.test(raw) ? Number(raw) : Number.NaN

  if (!Number.isSafeInteger(value)) {
    throw CoercionError.notAnInteger({ source, key, raw })
  }

  // "-0"
  return value === 0 ? 0 : value
}

/**
 * Case-insensitive. Only `0`, `f`, `false`, `n` and `no` are false; every
 * other string, the empty one included, is true.
 */
export function coerceBoolean(raw: string): boolean {
  return !FALSE_WORDS.has(raw.toLowerCase())
}
