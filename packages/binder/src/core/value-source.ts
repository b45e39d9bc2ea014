/** Where a field's value can come from. */
export type ValueSource = "default" | "flag" | "env" | "file"

/** How each source is named in user-facing messages. */
export const SOURCE_LABELS: Readonly<Record<ValueSource, string>> = {
  default: "default value",
  flag: "command line flag",
  env: "environment variable",
  file: "file",
}
