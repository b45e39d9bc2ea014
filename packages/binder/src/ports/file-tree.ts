/**
 * Read-only view of a configuration directory.
 *
 * Implementations are synchronous: binding happens once, at startup, before
 * anything else is running.
 */
export interface FileTree {
  /**
   * Maps the base name of every regular file under `root`, at any depth, to
   * its full path.
   *
   * - An empty `root` or one that does not exist yields an empty map
   * - When two files share a base name, the first one in walk order wins
   * - Any other traversal failure is thrown as-is
   */
  index(root: string): ReadonlyMap<string, string>

  /**
   * Reads a whole file as UTF-8 text.
   *
   * @returns `undefined` if the file no longer exists; any other failure is thrown.
   */
  read(filePath: string): string | undefined
}
