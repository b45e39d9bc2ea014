import type { Logger } from "@bindery/logger"
import { type FieldBinding, createBinding } from "./binding"
import { InvalidArgumentError } from "./errors"
import { type FieldSchema, FieldSpec } from "./fields"

export type Discovery = {
  bindings: FieldBinding[]
  skipped: string[]
}

/**
 * Builds one binding per eligible schema entry, in declaration order.
 *
 * File lookup is on only when `directory` is non-empty; then a field's file
 * key is its explicit `file` option or its lower-cased name.
 */
export function discoverFields(
  target: object,
  schema: FieldSchema,
  directory: string,
  logger: Logger,
): Discovery {
  const bindings: FieldBinding[] = []
  const skipped: string[] = []

  for (const [field, spec] of Object.entries<unknown>(schema)) {
    if (!(spec instanceof FieldSpec)) {
      logger.debug("skipping field because it is not of a supported type", { field })
      skipped.push(field)
      continue
    }

    if (!isWritable(target, field)) {
      logger.warn("skipping field because it cannot be set", { field })
      skipped.push(field)
      continue
    }

    const { options } = spec

    bindings.push(
      createBinding(
        spec.kind,
        {
          field,
          fileKey: directory ? (options.file ?? field.toLowerCase()) : "",
          envKey: options.env ?? field.toUpperCase(),
          flagKey: options.flag ?? field.toLowerCase(),
          mandatory: options.mandatory === true,
          usage: options.usage ?? "",
          defaultValue: options.default,
        },
        target,
      ),
    )
  }

  assertUniqueFlags(bindings)

  return { bindings, skipped }
}

function assertUniqueFlags(bindings: readonly FieldBinding[]): void {
  const byFlag = new Map<string, string[]>()

  for (const binding of bindings) {
    const fields = byFlag.get(binding.flagKey) ?? []
    fields.push(binding.field)
    byFlag.set(binding.flagKey, fields)
  }

  for (const [flagKey, fields] of byFlag) {
    if (fields.length > 1) throw InvalidArgumentError.duplicateFlag(flagKey, fields)
  }
}

function isWritable(target: object, field: string): boolean {
  let owner: object | null = target

  while (owner !== null) {
    const descriptor = Object.getOwnPropertyDescriptor(owner, field)

    if (descriptor) {
      if ("value" in descriptor) {
        return descriptor.writable === true && (owner === target || Object.isExtensible(target))
      }

      return descriptor.set !== undefined
    }

    owner = Object.getPrototypeOf(owner)
  }

  return Object.isExtensible(target)
}
