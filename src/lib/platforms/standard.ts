import * as path from 'path'
import type { CompilationSession } from '../compilation/session'
import { loadExportFile, loadFromCompile } from '../export/standard'
import { CompileOptions } from '../types/options'
import { PlatformType } from '../types/platform'
import { AbstractPlatform, PlatformDefinition } from './types'

const NAME = 'Standard'
const PROJECT_URL = 'https://github.com/solcanon/solcanon'
const EXPORT_SUFFIX = '_export.json'

interface UnderlyingPlatform {
  name: string
  projectUrl: string
  type: number
}

/**
 * Re-loads a previously written export. Reports the tool that produced the
 * export rather than itself.
 */
export class Standard extends AbstractPlatform {
  readonly name = NAME
  readonly projectUrl = PROJECT_URL
  readonly type = PlatformType.STANDARD

  private underlying: UnderlyingPlatform = { name: NAME, projectUrl: PROJECT_URL, type: PlatformType.STANDARD }
  private unitTests: string[] = []

  async compile(session: CompilationSession): Promise<void> {
    this.load(session, await loadExportFile(this.target))
  }

  /**
   * Imports an already parsed document into the session.
   */
  load(session: CompilationSession, document: unknown): void {
    const { platformType, unitTests } = loadFromCompile(session, document)
    const definition = session.registry.resolve(platformType)
    this.underlying = {
      name: definition.name,
      projectUrl: definition.projectUrl,
      // An unknown tag falls back to Standard's descriptor but the recorded tag is kept
      type: definition.type === PlatformType.STANDARD ? platformType : definition.type
    }
    this.unitTests = unitTests
  }

  // Recorded through `dependencies` at import time
  protected isDependencyPath(): boolean {
    return false
  }

  protected platformGuessedTests(): string[] {
    return []
  }

  public async guessedTests(): Promise<string[]> {
    return [...this.unitTests]
  }

  public platformNameUsed(): string {
    return this.underlying.name
  }

  public platformProjectUrlUsed(): string {
    return this.underlying.projectUrl
  }

  public platformTypeUsed(): number {
    return this.underlying.type
  }
}

export const standardDefinition: PlatformDefinition = {
  name: NAME,
  projectUrl: PROJECT_URL,
  type: PlatformType.STANDARD,
  hidden: true,

  async isSupported(target: string, options: CompileOptions): Promise<boolean> {
    if (options.standardIgnore) {
      return false
    }
    return path.basename(target).endsWith(EXPORT_SUFFIX)
  },

  create(target: string, options: CompileOptions) {
    return new Standard(target, options)
  }
}
