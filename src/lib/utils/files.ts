import * as fs from 'fs/promises'
import * as path from 'path'

const DEFAULT_IGNORED_DIRS = new Set(['node_modules', 'dist', '.git', '.idea', '.vscode'])

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p)
    return true
  } catch {
    return false
  }
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory()
  } catch {
    return false
  }
}

/**
 * Recursively finds files whose name satisfies `accept`, skipping the usual
 * dependency and tooling directories. Results are sorted for stable output.
 */
export async function findFiles(
  dir: string,
  accept: (fileName: string) => boolean,
  ignoreDirs: Set<string> = DEFAULT_IGNORED_DIRS
): Promise<string[]> {
  const results: string[] = []
  const walk = async (current: string): Promise<void> => {
    // Unreadable directories are not part of the project
    const entries = await fs.readdir(current, { withFileTypes: true }).catch(() => undefined)
    if (!entries) {
      return
    }
    for (const dirent of entries) {
      const fullPath = path.join(current, dirent.name)
      if (dirent.isDirectory()) {
        if (!ignoreDirs.has(dirent.name)) {
          await walk(fullPath)
        }
      } else if (dirent.isFile() && accept(dirent.name)) {
        results.push(fullPath)
      }
    }
  }
  await walk(dir)
  return results.sort()
}

/**
 * Reads and parses a JSON file. Read and parse errors propagate to the caller,
 * which decides which error kind they map to.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, 'utf-8')
  const parsed: unknown = JSON.parse(content)
  return parsed
}
