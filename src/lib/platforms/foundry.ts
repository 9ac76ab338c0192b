import * as path from 'path'
import type { CompilationSession } from '../compilation/session'
import { stripRoots } from '../naming/filename'
import { CompileOptions } from '../types/options'
import { PlatformType } from '../types/platform'
import { pathExists } from '../utils/files'
import { loadBuildInfoDirectory } from './build-info-loader'
import { runTool } from './process'
import { AbstractPlatform, PlatformDefinition, hasPathSegment } from './types'

const NAME = 'Foundry'
const PROJECT_URL = 'https://github.com/foundry-rs/foundry'

export const foundryShortPath = stripRoots('src', 'lib')

export class Foundry extends AbstractPlatform {
  readonly name = NAME
  readonly projectUrl = PROJECT_URL
  readonly type = PlatformType.FOUNDRY

  async compile(session: CompilationSession): Promise<void> {
    if (!this.shouldSkipCompile(this.options.foundryIgnoreCompile)) {
      await runTool('forge', ['build', '--build-info'], this.target)
    }

    const out = this.resolveInTarget(this.options.foundryOutDirectory ?? 'out')
    await loadBuildInfoDirectory(session, path.join(out, 'build-info'), foundryShortPath, 'forge')
  }

  protected isDependencyPath(filePath: string): boolean {
    return hasPathSegment(filePath, 'lib', 'node_modules')
  }

  protected platformGuessedTests(): string[] {
    return ['forge test']
  }
}

export const foundryDefinition: PlatformDefinition = {
  name: NAME,
  projectUrl: PROJECT_URL,
  type: PlatformType.FOUNDRY,

  async isSupported(target: string, options: CompileOptions): Promise<boolean> {
    if (options.foundryIgnore) {
      return false
    }
    return pathExists(path.join(target, 'foundry.toml'))
  },

  create(target: string, options: CompileOptions) {
    return new Foundry(target, options)
  }
}
