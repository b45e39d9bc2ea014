import fs from "node:fs"
import path from "node:path"
import type { FileTree } from "../../ports/file-tree"

/**
 * {@link FileTree} over the local file system.
 *
 * Directories are walked depth-first in lexical order without following
 * symbolic links; only regular files are indexed.
 */
export class NodeFileTree implements FileTree {
  index(root: string): ReadonlyMap<string, string> {
    const files = new Map<string, string>()

    if (!root) return files

    try {
      this.walk(root, files)
    } catch (err) {
      if (isNotFound(err)) return files
      throw err
    }

    return files
  }

  read(filePath: string): string | undefined {
    try {
      return fs.readFileSync(filePath, "utf-8")
    } catch (err) {
      if (isNotFound(err)) return undefined
      throw err
    }
  }

  private walk(directory: string, files: Map<string, string>): void {
    const entries = fs
      .readdirSync(directory, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name)

      if (entry.isDirectory()) {
        this.walk(fullPath, files)
      } else if (entry.isFile() && !files.has(entry.name)) {
        files.set(entry.name, fullPath)
      }
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
