import type { EnvStore } from "../../ports/env-store"

/**
 * Reads from a plain record. The record is not copied, so with the
 * default `process.env` later changes are visible.
 */
export class RecordEnvStore implements EnvStore {
  private readonly env: Readonly<Record<string, string | undefined>>

  constructor(env: Readonly<Record<string, string | undefined>> = process.env) {
    this.env = env
  }

  get(key: string): string | undefined {
    return Object.hasOwn(this.env, key) ? this.env[key] : undefined
  }
}
