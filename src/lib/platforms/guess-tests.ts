import * as fs from 'fs/promises'
import * as path from 'path'
import { isJsonObject } from '../types/json'
import { readJsonFile } from '../utils/files'

async function readText(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf-8')
  } catch {
    return undefined
  }
}

/**
 * Test commands any project may expose, independent of its build tool:
 * an npm `test` script, a README mentioning `yarn test`, a Makefile `test:` rule.
 */
export async function guessGenericTests(target: string): Promise<string[]> {
  const tests: string[] = []

  const packageFile = path.join(target, 'package.json')
  const manifest = await readJsonFile(packageFile).catch(() => undefined)
  if (isJsonObject(manifest) && isJsonObject(manifest.scripts) && typeof manifest.scripts.test === 'string') {
    tests.push('npm test')
  }

  const readme = await readText(path.join(target, 'README.md'))
  if (readme?.includes('yarn test')) {
    tests.push('yarn test')
  }

  const makefile = await readText(path.join(target, 'Makefile'))
  if (makefile !== undefined && /^test:/m.test(makefile)) {
    tests.push('make test')
  }

  return tests
}
