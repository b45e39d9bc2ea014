import type { IBindReport } from "../ports/bind-report"

export class BindReport<T extends object> implements IBindReport<T> {
  constructor(
    private readonly record: T,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly setFields: ReadonlySet<string>,
    private readonly skippedFields: readonly string[],
  ) {}

  get value(): T {
    return this.record
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance.get(key) ?? "skipped"
  }

  isSet<K extends keyof T & string>(key: K): boolean {
    return this.setFields.has(key)
  }

  sourcesUsed(): string[] {
    const kinds = [...this.provenance.values()]
      .filter((origin) => origin !== "zero")
      .map((origin) => origin.split(":", 1)[0] ?? origin)

    return [...new Set(kinds)]
  }

  skipped(): string[] {
    return [...this.skippedFields]
  }
}
