import {
  Command,
  CommanderError,
  InvalidArgumentError as InvalidOptionArgumentError,
  Option,
} from "commander"
import { FlagParseError, InvalidArgumentError } from "../../core/errors"
import type { FlagDefinition, FlagRegistry } from "../../ports/flag-registry"

export type CommanderFlagRegistryOptions = {
  /** Name shown in usage output */
  programName?: string

  /**
   * Register commander's `-h, --help`. Turn it off for a pre-parse that
   * must not react to help requests.
   *
   * @default true
   */
  helpOption?: boolean

  /** @default writes to process.stdout */
  writeOut?: (text: string) => void

  /** @default writes to process.stderr */
  writeErr?: (text: string) => void
}

/**
 * {@link FlagRegistry} on top of commander.
 *
 * Accepts the single-dash long form (`-port 8000`, `-port=8000`) next to
 * `--port`. Unknown options and stray arguments are ignored, and commander
 * never exits the process: failures surface as thrown errors after
 * commander has written its message to `writeErr`.
 */
export class CommanderFlagRegistry implements FlagRegistry {
  private readonly program: Command
  private readonly writeErr: (text: string) => void
  /** name -> whether the flag is boolean */
  private readonly registered = new Map<string, boolean>()
  private setterError: { err: unknown } | undefined

  constructor(options: CommanderFlagRegistryOptions = {}) {
    this.writeErr = options.writeErr ?? ((text) => process.stderr.write(text))

    this.program = new Command(options.programName)
      .allowUnknownOption()
      .allowExcessArguments(true)
      .exitOverride()
      .configureOutput({
        writeOut: options.writeOut ?? ((text) => process.stdout.write(text)),
        writeErr: this.writeErr,
      })

    if (options.helpOption === false) {
      this.program.helpOption(false)
    }
  }

  register(flag: FlagDefinition): void {
    if (this.registered.has(flag.name)) {
      throw InvalidArgumentError.flagRegistered(flag.name)
    }

    const option = new Option(
      flag.isBoolean ? `--${flag.name} [value]` : `--${flag.name} <value>`,
      flag.usage,
    ).argParser((raw: string) => {
      this.deliver(flag, raw)
      return raw
    })

    if (flag.defaultValue !== undefined) {
      option.default(flag.defaultValue)
    }

    this.program.addOption(option)
    this.registered.set(flag.name, flag.isBoolean)
  }

  parse(argv: readonly string[]): void {
    try {
      this.program.parse(normalizeArgv(argv, this.registered), { from: "user" })
    } catch (err) {
      const setterError = this.takeSetterError()

      if (setterError) throw setterError.err

      if (err instanceof CommanderError) {
        if (err.code === "commander.helpDisplayed" || err.code === "commander.help") {
          throw FlagParseError.helpRequested()
        }

        throw FlagParseError.invalid(err.message, err)
      }

      throw err
    }
  }

  writeError(text: string): void {
    this.writeErr(text)
  }

  printUsage(): void {
    this.program.outputHelp({ error: true })
  }

  private takeSetterError(): { err: unknown } | undefined {
    const setterError = this.setterError
    this.setterError = undefined
    return setterError
  }

  private deliver(flag: FlagDefinition, raw: string): void {
    try {
      flag.set(raw)
    } catch (err) {
      // commander reports InvalidArgumentError to writeErr; the original is rethrown from parse()
      this.setterError = { err }
      throw new InvalidOptionArgumentError(err instanceof Error ? err.message : String(err))
    }
  }
}

/**
 * Rewrites argv into the form commander expects:
 *
 * - `-name` and `-name=value` become `--name...` for registered flags
 * - a bare boolean flag becomes `--name=true`, so it never swallows the
 *   next argument
 * - the argument after a value-taking flag is passed through untouched,
 *   as is everything after `--`
 */
export function normalizeArgv(
  argv: readonly string[],
  registered: ReadonlyMap<string, boolean>,
): string[] {
  const out: string[] = []
  let expectValue = false

  for (const [index, arg] of argv.entries()) {
    if (expectValue) {
      out.push(arg)
      expectValue = false
      continue
    }

    if (arg === "--") {
      out.push(...argv.slice(index))
      break
    }

    const match = /^--?([^-=][^=]*)(=.*)?$/.exec(arg)
    const name = match?.[1]
    const isBoolean = name === undefined ? undefined : registered.get(name)

    if (name === undefined || isBoolean === undefined) {
      out.push(arg)
      continue
    }

    const assigned = match?.[2]

    if (assigned !== undefined) {
      out.push(`--${name}${assigned}`)
    } else if (isBoolean) {
      out.push(`--${name}=true`)
    } else {
      out.push(`--${name}`)
      expectValue = true
    }
  }

  return out
}
