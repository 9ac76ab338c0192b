import { InvalidCompilation, errorMessage } from '../errors'
import { compilationEvents } from '../events/emitter'
import { Filename, FilenameResolver, ShortPathRule } from '../naming/filename'
import { Platform, PlatformDefinition } from '../platforms/types'
import { PlatformRegistry, defaultRegistry } from '../platforms/registry'
import { Standard, standardDefinition } from '../platforms/standard'
import { CompileOptions } from '../types/options'
import { CompilationUnit } from './unit'

/**
 * Top-level owner of one compiled target: its compilation units, every known
 * source file and the set of paths that belong to dependencies.
 */
export class CompilationSession {
  public readonly compilationUnits: Map<string, CompilationUnit> = new Map()
  public filenames: Set<Filename> = new Set()
  // Any of the four Filename views of dependency sources
  public readonly dependencies: Set<string> = new Set()
  public packageName: string | null = null
  public workingDir: string

  private _platform?: Platform
  private resolver: FilenameResolver

  constructor(
    public readonly target: string,
    public readonly options: CompileOptions = {},
    public readonly registry: PlatformRegistry = defaultRegistry,
    workingDir: string = process.cwd()
  ) {
    this.workingDir = workingDir
    this.resolver = new FilenameResolver()
  }

  /**
   * Detects the platform of `target`, compiles it and returns the populated
   * session. Nothing is returned when any step fails.
   */
  static async create(
    target: string,
    options: CompileOptions = {},
    registry: PlatformRegistry = defaultRegistry
  ): Promise<CompilationSession> {
    const session = new CompilationSession(target, options, registry)
    await session.compile()
    return session
  }

  /**
   * Loads an export file written by `exportToStandard`, whatever its name.
   */
  static async fromExportFile(
    filePath: string,
    registry: PlatformRegistry = defaultRegistry
  ): Promise<CompilationSession> {
    const session = new CompilationSession(filePath, {}, registry)
    await session.compile(standardDefinition)
    return session
  }

  /**
   * Builds a session from an already parsed export document.
   */
  static fromExport(
    document: unknown,
    target: string = 'export.json',
    registry: PlatformRegistry = defaultRegistry
  ): CompilationSession {
    const session = new CompilationSession(target, {}, registry)
    const platform = new Standard(target, {})
    platform.load(session, document)
    session._platform = platform
    return session
  }

  public get platform(): Platform {
    if (!this._platform) {
      throw new Error(`No platform has been selected for ${this.target}`)
    }
    return this._platform
  }

  public hasPlatform(): boolean {
    return this._platform !== undefined
  }

  /**
   * Runs the given platform, or the first registered one that supports the
   * target. Units are checked for completeness afterwards; on failure the
   * session is emptied and the error propagates unchanged.
   */
  public async compile(definition?: PlatformDefinition): Promise<void> {
    compilationEvents.emitEvent({
      type: 'compile_started',
      level: 'info',
      data: { target: this.target }
    })

    try {
      const selected = definition ?? await this.registry.detect(this.target, this.options)
      if (!selected) {
        throw new InvalidCompilation(`No supported build platform found for ${this.target}`)
      }
      compilationEvents.emitEvent({
        type: 'platform_detected',
        level: 'info',
        data: { target: this.target, platform: selected.name }
      })

      const platform = selected.create(this.target, this.options)
      await platform.compile(this)
      this._platform = platform

      for (const unit of this.compilationUnits.values()) {
        unit.assertComplete()
        compilationEvents.emitEvent({
          type: 'compilation_unit_loaded',
          level: 'debug',
          data: {
            key: unit.key,
            contractCount: unit.contractsNames.size,
            compiler: unit.compilerVersion.compiler,
            version: unit.compilerVersion.version
          }
        })
      }
    } catch (error) {
      this.reset()
      compilationEvents.emitEvent({
        type: 'compile_failed',
        level: 'error',
        data: { target: this.target, error: errorMessage(error) }
      })
      throw error
    }

    compilationEvents.emitEvent({
      type: 'compile_completed',
      level: 'info',
      data: {
        target: this.target,
        unitCount: this.compilationUnits.size,
        contractCount: this.contractsNames().size
      }
    })
  }

  /**
   * Resolves a path reported by a build tool and records it as a known file.
   * @param workingDir directory the tool reported the path from; defaults to the target
   */
  public resolveFilename(rawPath: string, shortRule: ShortPathRule, workingDir: string = this.target): Filename {
    const filename = this.resolver.resolve(rawPath, shortRule, workingDir, this.packageName ?? undefined)
    this.filenames.add(filename)
    return filename
  }

  /**
   * Records a Filename built outside the resolver, keeping one instance per
   * absolute path.
   */
  public rememberFilename(filename: Filename): Filename {
    return this.resolver.remember(filename)
  }

  public addCompilationUnit(unit: CompilationUnit): void {
    if (this.compilationUnits.has(unit.key)) {
      throw new InvalidCompilation(`Duplicate compilation unit "${unit.key}"`)
    }
    this.compilationUnits.set(unit.key, unit)
  }

  /**
   * Recomputes `filenames` as the union of every unit's contract filenames.
   */
  public rebuildFilenames(): void {
    const filenames: Set<Filename> = new Set()
    for (const unit of this.compilationUnits.values()) {
      for (const filename of unit.contractsFilenames.values()) {
        filenames.add(filename)
      }
    }
    this.filenames = filenames
  }

  public isDependency(path: string): boolean {
    if (this.dependencies.has(path)) {
      return true
    }
    return this._platform ? this._platform.isDependency(path) : false
  }

  /**
   * Finds a known file by any of its four views.
   */
  public filenameLookup(view: string): Filename | undefined {
    for (const filename of this.filenames) {
      if (filename.views().includes(view)) {
        return filename
      }
    }
    return undefined
  }

  public contractsNames(): Set<string> {
    const names: Set<string> = new Set()
    for (const unit of this.compilationUnits.values()) {
      for (const name of unit.contractsNames) {
        names.add(name)
      }
    }
    return names
  }

  public isInMultipleCompilationUnits(contractName: string): boolean {
    let count = 0
    for (const unit of this.compilationUnits.values()) {
      if (unit.contractsNames.has(contractName)) {
        count++
      }
    }
    return count > 1
  }

  private reset(): void {
    this.compilationUnits.clear()
    this.filenames = new Set()
    this.dependencies.clear()
    this.resolver = new FilenameResolver()
    this._platform = undefined
  }
}
