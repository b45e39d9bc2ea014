import { createNullLogger, type Logger } from "@bindery/logger"
import { CommanderFlagRegistry } from "../adapters/commander/commander-flag-registry"
import { NodeFileTree } from "../adapters/fs/node-file-tree"
import type { IBindReport } from "../ports/bind-report"
import type { EnvStore } from "../ports/env-store"
import type { FileTree } from "../ports/file-tree"
import type { FlagRegistry } from "../ports/flag-registry"
import { BindReport } from "./bind-report"
import { type FieldBinding, applyValue, assignZero } from "./binding"
import { discoverFields } from "./discover"
import { type EnvInput, toEnvStore } from "./env-input"
import { CoercionError, InvalidArgumentError, MandatoryMissingError, SourceReadError } from "./errors"
import type { FieldSchema, InferFields } from "./fields"

export type BindOptions = {
  /**
   * Configuration directory searched recursively for one file per field.
   * Empty or absent turns file lookup off.
   */
  directory?: string

  /** @default process.argv.slice(2) */
  argv?: readonly string[]

  /** @default process.env */
  env?: EnvInput

  /** @default new NodeFileTree() */
  files?: FileTree

  /**
   * Must be fresh: the bind registers every field on it.
   *
   * @default new CommanderFlagRegistry()
   */
  flags?: FlagRegistry

  /** @default a NullLogger */
  logger?: Logger
}

/**
 * Everything one bind call works with. Created on entry and dropped on
 * return, so nothing carries over between calls.
 */
type ResolutionContext = {
  readonly directory: string
  readonly bindings: readonly FieldBinding[]
  readonly files: FileTree
  readonly env: EnvStore
  readonly flags: FlagRegistry
  readonly logger: Logger
}

/**
 * Populates `target` in place from files, environment variables and
 * command-line flags, in that order of precedence.
 *
 * 1. every field's flag is registered
 * 2. every field is reset to its zero value, then its default, and argv is
 *    parsed
 * 3. a file named after the field, then an environment variable, override
 *    whatever the flags set
 * 4. mandatory fields still unset are listed on the flag registry's error
 *    stream together with its usage text
 *
 * @throws InvalidArgumentError when `target` is not an object, two fields share a flag, or
 *   `flags` already holds one of them
 * @throws CoercionError when a value does not fit its field's kind
 * @throws SourceReadError when the directory or a file in it cannot be read
 * @throws FlagParseError when argv is malformed or asks for help
 * @throws MandatoryMissingError naming every mandatory field left unset
 */
export function bind<S extends FieldSchema>(
  target: InferFields<S>,
  schema: S,
  options: BindOptions = {},
): IBindReport<InferFields<S>> {
  if (typeof target !== "object" || target === null || Array.isArray(target)) {
    throw InvalidArgumentError.notAnObject(kindOf(target))
  }

  const logger = (options.logger ?? createNullLogger()).child({ module: "binder" })
  const directory = options.directory ?? ""
  const { bindings, skipped } = discoverFields(target, schema, directory, logger)

  const ctx: ResolutionContext = {
    directory,
    bindings,
    files: options.files ?? new NodeFileTree(),
    env: toEnvStore(options.env ?? process.env),
    flags: options.flags ?? new CommanderFlagRegistry(),
    logger,
  }

  registerFlags(ctx)
  ctx.flags.parse(options.argv ?? process.argv.slice(2))
  resolveSources(ctx)
  checkMandatory(ctx)

  return new BindReport(
    target,
    new Map(bindings.map((b): [string, string] => [b.field, b.origin])),
    new Set(bindings.filter((b) => b.isSet).map((b) => b.field)),
    skipped,
  )
}

/**
 * {@link bind} without a configuration directory: environment variables
 * override flags, and files are never consulted.
 */
export function parse<S extends FieldSchema>(
  target: InferFields<S>,
  schema: S,
  options: Omit<BindOptions, "directory"> = {},
): IBindReport<InferFields<S>> {
  return bind(target, schema, { ...options, directory: "" })
}

function registerFlags(ctx: ResolutionContext): void {
  for (const binding of ctx.bindings) {
    ctx.flags.register({
      name: binding.flagKey,
      usage: binding.usage,
      isBoolean: binding.kind === "boolean",
      ...(binding.defaultValue !== undefined && { defaultValue: binding.defaultValue }),
      set: (raw) => {
        applyValue(binding, raw, "flag", binding.flagKey)
        ctx.logger.debug("field resolved", {
          field: binding.field,
          source: "flag",
          key: binding.flagKey,
        })
      },
    })
  }

  // a registry that rejects a flag must leave the record untouched
  for (const binding of ctx.bindings) {
    assignZero(binding)

    if (binding.defaultValue !== undefined) {
      applyDefault(ctx, binding, binding.defaultValue)
    }
  }
}

function applyDefault(ctx: ResolutionContext, binding: FieldBinding, raw: string): void {
  try {
    applyValue(binding, raw, "default", binding.field)
  } catch (err) {
    if (!(err instanceof CoercionError)) throw err

    ctx.logger.warn("ignoring default value that does not fit the field", {
      field: binding.field,
      err,
    })
  }
}

function resolveSources(ctx: ResolutionContext): void {
  const files = indexDirectory(ctx)

  for (const binding of ctx.bindings) {
    if (resolveFromFile(ctx, files, binding)) continue

    const raw = ctx.env.get(binding.envKey)

    if (raw === undefined) continue

    applyValue(binding, raw, "env", binding.envKey)
    ctx.logger.debug("field resolved", { field: binding.field, source: "env", key: binding.envKey })
  }
}

function indexDirectory(ctx: ResolutionContext): ReadonlyMap<string, string> {
  if (!ctx.directory) return new Map()

  try {
    return ctx.files.index(ctx.directory)
  } catch (err) {
    throw SourceReadError.untraversable(ctx.directory, err)
  }
}

function resolveFromFile(
  ctx: ResolutionContext,
  files: ReadonlyMap<string, string>,
  binding: FieldBinding,
): boolean {
  if (!binding.fileKey) return false

  const filePath = files.get(binding.fileKey)

  if (filePath === undefined) return false

  let contents: string | undefined

  try {
    contents = ctx.files.read(filePath)
  } catch (err) {
    throw SourceReadError.unreadable(filePath, err)
  }

  if (contents === undefined) {
    ctx.logger.debug("config file disappeared before it was read", {
      field: binding.field,
      key: filePath,
    })
    return false
  }

  applyValue(binding, contents, "file", binding.fileKey, filePath)
  ctx.logger.debug("field resolved", { field: binding.field, source: "file", key: filePath })

  return true
}

function checkMandatory(ctx: ResolutionContext): void {
  const missing = ctx.bindings.filter((b) => b.mandatory && !b.isSet)

  if (missing.length === 0) return

  for (const b of missing) {
    ctx.flags.writeError(
      `Mandatory flag -${b.flagKey} (or environment variable ${b.envKey}) does not exist.\n`,
    )
  }

  ctx.flags.printUsage()

  throw MandatoryMissingError.of(
    missing.map((b) => ({ field: b.field, flagKey: b.flagKey, envKey: b.envKey })),
  )
}

function kindOf(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"

  return typeof value
}
