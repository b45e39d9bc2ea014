/**
 * Outcome of a successful bind: the populated record plus where each value
 * came from.
 *
 * @typeParam T - The record type, usually `InferFields<typeof schema>`.
 *
 * @example
 * ```typescript
 * const report = bind(config, schema, { directory: "/config" })
 *
 * report.explain("port")    // "env:PORT"
 * report.explain("hostname") // "file:/config/app/hostname"
 * report.sourcesUsed()      // ["file", "env"]
 * ```
 */
export interface IBindReport<T extends object> {
  /** The record that was bound, same reference as the one passed in */
  readonly value: T

  /**
   * Names the source that provided the field's final value.
   *
   * @returns `"file:<path>"`, `"env:<KEY>"`, `"flag:<name>"`, `"default"`,
   * `"zero"` when nothing touched the field, or `"skipped"` for fields
   * discovery left out.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Whether any source, the declared default included, set the field. */
  isSet<K extends keyof T & string>(key: K): boolean

  /**
   * Distinct kinds of source ("file", "env", "flag", "default") that set at
   * least one field, in field order.
   */
  sourcesUsed(): string[]

  /** Schema keys that discovery skipped. */
  skipped(): string[]
}
