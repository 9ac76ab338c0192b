import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'

export const fixturesDir = path.join(__dirname, 'fixtures')

/**
 * Creates a temporary project holding the given files (relative path -> content).
 */
export async function createProject(files: Record<string, string>): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'solcanon-'))
  for (const [relative, content] of Object.entries(files)) {
    const filePath = path.join(root, relative)
    await fs.mkdir(path.dirname(filePath), { recursive: true })
    await fs.writeFile(filePath, content)
  }
  return root
}

export async function readFixture(name: string): Promise<string> {
  return fs.readFile(path.join(fixturesDir, name), 'utf-8')
}

export async function removeProject(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true })
}
