import * as path from 'path'
import type { CompilationSession } from '../compilation/session'
import { stripRoots } from '../naming/filename'
import { CompileOptions } from '../types/options'
import { PlatformType } from '../types/platform'
import { pathExists } from '../utils/files'
import { loadBuildInfoDirectory } from './build-info-loader'
import { runTool } from './process'
import { AbstractPlatform, PlatformDefinition, hasPathSegment } from './types'

const NAME = 'Hardhat'
const PROJECT_URL = 'https://github.com/NomicFoundation/hardhat'
const CONFIG_FILES = ['hardhat.config.js', 'hardhat.config.ts', 'hardhat.config.cjs', 'hardhat.config.mjs']

export const hardhatShortPath = stripRoots('contracts')

export class Hardhat extends AbstractPlatform {
  readonly name = NAME
  readonly projectUrl = PROJECT_URL
  readonly type = PlatformType.HARDHAT

  async compile(session: CompilationSession): Promise<void> {
    if (!this.shouldSkipCompile(this.options.hardhatIgnoreCompile)) {
      const args = ['hardhat', 'compile', '--force']
      if (this.options.npxDisable) {
        await runTool(args[0], args.slice(1), this.target)
      } else {
        await runTool('npx', args, this.target)
      }
    }

    const artifacts = this.resolveInTarget(this.options.hardhatArtifactsDirectory ?? 'artifacts')
    await loadBuildInfoDirectory(session, path.join(artifacts, 'build-info'), hardhatShortPath, 'hardhat')
  }

  protected isDependencyPath(filePath: string): boolean {
    return hasPathSegment(filePath, 'node_modules')
  }

  protected platformGuessedTests(): string[] {
    return ['npx hardhat test']
  }
}

export const hardhatDefinition: PlatformDefinition = {
  name: NAME,
  projectUrl: PROJECT_URL,
  type: PlatformType.HARDHAT,

  async isSupported(target: string, options: CompileOptions): Promise<boolean> {
    if (options.hardhatIgnore) {
      return false
    }
    for (const config of CONFIG_FILES) {
      if (await pathExists(path.join(target, config))) {
        return true
      }
    }
    return false
  },

  create(target: string, options: CompileOptions) {
    return new Hardhat(target, options)
  }
}
