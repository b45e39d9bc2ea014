export type FlagDefinition = {
  /** Flag name without dashes, e.g. "port" for `-port 8000` */
  name: string

  usage: string

  /**
   * Boolean flags need no value: `-async` alone means "true", and
   * `-async=false` is the only way to pass one explicitly.
   */
  isBoolean: boolean

  /** Shown in usage output; not applied by the registry. */
  defaultValue?: string

  /**
   * Receives the raw value each time the flag occurs in argv. Errors it
   * throws abort parsing.
   */
  set: (raw: string) => void
}

/**
 * Command-line flag parser with callback-based value delivery.
 *
 * A registry instance serves a single parse: register every flag first,
 * then call `parse` once.
 */
export interface FlagRegistry {
  /** @throws InvalidArgumentError when a flag of the same name is already registered */
  register(flag: FlagDefinition): void

  /**
   * Parses argv (without the node and script entries), calling each
   * flag's `set` as it is encountered. Unregistered flags are ignored.
   *
   * On malformed input the registry reports to its error stream, then
   * throws: the setter's own error when a setter failed, a
   * `FlagParseError` otherwise.
   */
  parse(argv: readonly string[]): void

  /** Writes text to the registry's error stream as-is. */
  writeError(text: string): void

  /** Writes usage text for every registered flag to the error stream. */
  printUsage(): void
}
