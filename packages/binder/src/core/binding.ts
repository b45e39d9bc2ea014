import { coerceBoolean, coerceInteger } from "./coerce"
import { InvalidArgumentError } from "./errors"
import { type FieldKind, type FieldValue, zeroValue } from "./fields"
import type { ValueSource } from "./value-source"

type BindingBase = {
  readonly field: string
  /** Empty when file lookup is off for this run */
  readonly fileKey: string
  readonly envKey: string
  readonly flagKey: string
  readonly mandatory: boolean
  readonly usage: string
  readonly defaultValue?: string | undefined

  isSet: boolean
  /** Provenance of the current value, see `IBindReport.explain` */
  origin: string
}

type KindBinding<K extends FieldKind> = BindingBase & {
  readonly kind: K
  readonly assign: (value: FieldValue<K>) => void
}

/**
 * One eligible field of the target record for the duration of a single
 * bind. `assign` writes straight into the caller's record.
 */
export type FieldBinding = KindBinding<"text"> | KindBinding<"integer"> | KindBinding<"boolean">

export type BindingKeys = Omit<BindingBase, "isSet" | "origin">

export function createBinding(kind: FieldKind, keys: BindingKeys, target: object): FieldBinding {
  const assign = (value: FieldValue<FieldKind>) => {
    if (!Reflect.set(target, keys.field, value)) {
      throw InvalidArgumentError.notWritable(keys.field)
    }
  }
  const base = { ...keys, isSet: false, origin: "zero" }

  switch (kind) {
    case "text":
      return { ...base, kind, assign }
    case "integer":
      return { ...base, kind, assign }
    case "boolean":
      return { ...base, kind, assign }
  }
}

/** Resets the field to its kind's zero value without marking it set. */
export function assignZero(binding: FieldBinding): void {
  switch (binding.kind) {
    case "text":
      binding.assign(zeroValue(binding.kind))
      break
    case "integer":
      binding.assign(zeroValue(binding.kind))
      break
    case "boolean":
      binding.assign(zeroValue(binding.kind))
      break
  }
}

/**
 * Coerces `raw` to the field's kind and stores it. Text is stored
 * verbatim, so a file's trailing newline stays part of the value.
 *
 * @param key - Lookup key named in coercion errors
 * @param location - Recorded as provenance; defaults to `key`
 */
export function applyValue(
  binding: FieldBinding,
  raw: string,
  source: ValueSource,
  key: string,
  location: string = key,
): void {
  switch (binding.kind) {
    case "text":
      binding.assign(raw)
      break
    case "integer":
      binding.assign(coerceInteger(raw, source, key))
      break
    case "boolean":
      binding.assign(coerceBoolean(raw))
      break
  }

  binding.isSet = true
  binding.origin = source === "default" ? "default" : `${source}:${location}`
}
