import * as path from 'path'
import type { CompilationSession } from '../compilation/session'
import { CompileOptions } from '../types/options'
import { PlatformType } from '../types/platform'
import { guessGenericTests } from './guess-tests'

/**
 * A build tool adapter bound to one target.
 */
export interface Platform {
  readonly name: string
  readonly projectUrl: string
  readonly type: PlatformType
  readonly target: string

  compile(session: CompilationSession): Promise<void>
  isDependency(filePath: string): boolean
  guessedTests(): Promise<string[]>

  // The tool that originally produced the data; differs from the above for re-loaded exports
  platformNameUsed(): string
  platformProjectUrlUsed(): string
  platformTypeUsed(): number
}

/**
 * Static side of an adapter, as kept by the registry.
 */
export interface PlatformDefinition {
  readonly name: string
  readonly projectUrl: string
  readonly type: PlatformType
  // Hidden platforms are left out of listings but still take part in detection
  readonly hidden?: boolean

  isSupported(target: string, options: CompileOptions): Promise<boolean>
  create(target: string, options: CompileOptions): Platform
}

/**
 * Whether any segment of `filePath` equals one of `segments`.
 */
export function hasPathSegment(filePath: string, ...segments: string[]): boolean {
  const parts = filePath.split(/[\\/]/)
  return segments.some((segment) => parts.includes(segment))
}

export abstract class AbstractPlatform implements Platform {
  abstract readonly name: string
  abstract readonly projectUrl: string
  abstract readonly type: PlatformType

  private readonly dependencyCache: Map<string, boolean> = new Map()

  constructor(
    public readonly target: string,
    protected readonly options: CompileOptions = {}
  ) {}

  abstract compile(session: CompilationSession): Promise<void>

  protected abstract isDependencyPath(filePath: string): boolean

  protected abstract platformGuessedTests(): string[]

  public isDependency(filePath: string): boolean {
    const cached = this.dependencyCache.get(filePath)
    if (cached !== undefined) {
      return cached
    }
    const result = this.isDependencyPath(filePath)
    this.dependencyCache.set(filePath, result)
    return result
  }

  public async guessedTests(): Promise<string[]> {
    const generic = await guessGenericTests(this.target)
    return [...generic, ...this.platformGuessedTests()]
  }

  public platformNameUsed(): string {
    return this.name
  }

  public platformProjectUrlUsed(): string {
    return this.projectUrl
  }

  public platformTypeUsed(): number {
    return this.type
  }

  /**
   * Whether the tool run must be skipped, through the global flag or the
   * adapter's own one.
   */
  protected shouldSkipCompile(ownFlag: boolean | undefined): boolean {
    return Boolean(this.options.ignoreCompile || ownFlag)
  }

  protected resolveInTarget(...segments: string[]): string {
    return path.join(this.target, ...segments)
  }
}
