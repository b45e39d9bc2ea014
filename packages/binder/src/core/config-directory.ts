import { CommanderFlagRegistry } from "../adapters/commander/commander-flag-registry"
import type { FlagRegistry } from "../ports/flag-registry"
import { type EnvInput, toEnvStore } from "./env-input"

export type ConfigDirectoryKeys = {
  /** Environment variable holding the directory; skipped when empty */
  envKey?: string
  /** Flag holding the directory; skipped when empty */
  flagKey?: string
  fallback: string
}

export type ConfigDirectoryOptions = {
  /** @default process.argv.slice(2) */
  argv?: readonly string[]
  /** @default process.env */
  env?: EnvInput
  /** @default a CommanderFlagRegistry without the help flag */
  flags?: FlagRegistry
}

/**
 * Works out the configuration directory before the main bind: the
 * environment variable if it is set and non-empty, else the flag if it
 * appears on the command line, else `fallback`.
 *
 * Runs its own flag parse over argv, ignoring every other flag, so it does
 * not interfere with the registry the bind uses afterwards.
 *
 * @example
 * ```typescript
 * const directory = resolveConfigDirectory({
 *   envKey: "CONFIGDIR",
 *   flagKey: "configdir",
 *   fallback: "/config",
 * })
 *
 * bind(config, schema, { directory })
 * ```
 */
export function resolveConfigDirectory(
  keys: ConfigDirectoryKeys,
  options: ConfigDirectoryOptions = {},
): string {
  if (keys.envKey) {
    const fromEnv = toEnvStore(options.env ?? process.env).get(keys.envKey)

    if (fromEnv) return fromEnv
  }

  if (keys.flagKey) {
    const found: { value?: string } = {}
    const flags = options.flags ?? new CommanderFlagRegistry({ helpOption: false })

    flags.register({
      name: keys.flagKey,
      usage: "configuration directory",
      isBoolean: false,
      defaultValue: keys.fallback,
      set: (raw) => {
        found.value = raw
      },
    })
    flags.parse(options.argv ?? process.argv.slice(2))

    if (found.value !== undefined) return found.value
  }

  return keys.fallback
}
