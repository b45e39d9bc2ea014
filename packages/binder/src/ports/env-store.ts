export interface EnvStore {
  /**
   * Returns the variable's value, or `undefined` when it is not set. A
   * variable set to the empty string is set.
   */
  get(key: string): string | undefined
}
