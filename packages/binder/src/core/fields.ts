import { z } from "zod"
import { InvalidArgumentError } from "./errors"

export type FieldKind = "text" | "integer" | "boolean"

export type FieldValue<K extends FieldKind> = {
  text: string
  integer: number
  boolean: boolean
}[K]

/**
 * Per-field customization. Keys left out fall back to the field name:
 * lower-cased for the file and the flag, upper-cased for the environment.
 */
export type FieldOptions = {
  /** Base name of the file in the configuration directory */
  file?: string
  env?: string
  /** Flag name without dashes */
  flag?: string
  /** Raw default, coerced like any other input */
  default?: string
  usage?: string
  /** The bind fails unless some source, or the default, sets the field. */
  mandatory?: true
}

const key = z
  .string()
  .min(1, "must not be empty")
  .regex(/^[^\s=,|]+$/, "must not contain whitespace, '=', ',' or '|'")

const fieldOptionsSchema = z.strictObject({
  file: key.optional(),
  env: key.optional(),
  flag: key.regex(/^[^-]/, "must not start with '-'").optional(),
  default: z.string().optional(),
  usage: z.string().optional(),
  mandatory: z.literal(true).optional(),
})

export class FieldSpec<K extends FieldKind = FieldKind> {
  readonly options: Readonly<FieldOptions>

  constructor(
    readonly kind: K,
    options: FieldOptions = {},
  ) {
    const result = fieldOptionsSchema.safeParse(options)

    if (!result.success) {
      throw InvalidArgumentError.fieldOptions(kind, z.prettifyError(result.error))
    }

    this.options = Object.freeze(result.data)
  }
}

export function text(options?: FieldOptions): FieldSpec<"text"> {
  return new FieldSpec("text", options)
}

export function integer(options?: FieldOptions): FieldSpec<"integer"> {
  return new FieldSpec("integer", options)
}

export function boolean(options?: FieldOptions): FieldSpec<"boolean"> {
  return new FieldSpec("boolean", options)
}

export type FieldSchema = Readonly<Record<string, FieldSpec>>

/**
 * Record type described by a schema.
 *
 * @example
 * ```typescript
 * const schema = defineFields({
 *   hostname: text({ env: "HOST", mandatory: true }),
 *   port: integer({ default: "8080" }),
 * })
 *
 * type ServerConfig = InferFields<typeof schema> // { hostname: string; port: number }
 * ```
 */
export type InferFields<S extends FieldSchema> = {
  -readonly [P in keyof S]: S[P] extends FieldSpec<infer K> ? FieldValue<K> : never
}

/**
 * Freezes a schema. Declaration order is the order flags are registered
 * and fields are resolved in.
 */
export function defineFields<S extends FieldSchema>(schema: S): Readonly<S> {
  return Object.freeze({ ...schema })
}

const ZERO_VALUES: { readonly [K in FieldKind]: FieldValue<K> } = {
  text: "",
  integer: 0,
  boolean: false,
}

export function zeroValue<K extends FieldKind>(kind: K): FieldValue<K> {
  return ZERO_VALUES[kind]
}
