import { RecordEnvStore } from "../adapters/env/record-env-store"
import type { EnvStore } from "../ports/env-store"

/** An {@link EnvStore}, or a plain record such as `process.env`. */
export type EnvInput = EnvStore | Readonly<Record<string, string | undefined>>

export function toEnvStore(env: EnvInput): EnvStore {
  return isEnvStore(env) ? env : new RecordEnvStore(env)
}

function isEnvStore(env: EnvInput): env is EnvStore {
  return typeof env.get === "function"
}
