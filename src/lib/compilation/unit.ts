import { Interface } from 'ethers'
import { InvalidCompilation } from '../errors'
import { Filename, extractName } from '../naming/filename'
import { JsonValue } from '../types/json'
import { CompilerVersion } from './compiler-version'
import { hashedPlaceholder, legacyPlaceholder, legacyPlaceholderName, findPlaceholders, linkBytecode } from './libraries'
import { Natspec } from './natspec'

/**
 * Everything an adapter knows about one compiled contract.
 */
export interface ContractArtifact {
  filename: Filename
  abi: JsonValue
  bytecodeInit: string
  bytecodeRuntime: string
  srcmapInit: string[]
  srcmapRuntime: string[]
  // placeholder -> library name; detected from the bytecode when omitted
  libraries?: Record<string, string>
  natspec?: Natspec
}

/**
 * Splits a compiler source map into its segments. An empty map yields `['']`
 * so that joining the segments restores the original string.
 */
export function splitSrcmap(srcmap: string): string[] {
  return srcmap.split(';')
}

export function joinSrcmap(segments: readonly string[]): string {
  return segments.join(';')
}

/**
 * One logical build: the artifacts of all its contracts, the ASTs of its
 * sources and the compiler that produced them. Units hold no reference to
 * their session.
 */
export class CompilationUnit {
  public readonly contractsNames: Set<string> = new Set()
  public readonly contractsFilenames: Map<string, Filename> = new Map()
  public readonly abis: Map<string, JsonValue> = new Map()
  public readonly bytecodesInit: Map<string, string> = new Map()
  public readonly bytecodesRuntime: Map<string, string> = new Map()
  public readonly srcmapsInit: Map<string, string[]> = new Map()
  public readonly srcmapsRuntime: Map<string, string[]> = new Map()
  public readonly libraries: Map<string, Record<string, string>> = new Map()
  public readonly natspec: Map<string, Natspec> = new Map()
  // absolute source path -> AST
  public readonly asts: Map<string, JsonValue> = new Map()

  private _compilerVersion?: CompilerVersion

  constructor(public readonly key: string) {}

  public get compilerVersion(): CompilerVersion {
    if (!this._compilerVersion) {
      throw new InvalidCompilation(`Compilation unit "${this.key}" has no compiler version`)
    }
    return this._compilerVersion
  }

  public hasCompilerVersion(): boolean {
    return this._compilerVersion !== undefined
  }

  public setCompilerVersion(version: CompilerVersion): void {
    if (this._compilerVersion) {
      throw new InvalidCompilation(`Compiler version of compilation unit "${this.key}" is already set`)
    }
    this._compilerVersion = version
  }

  /**
   * Registers a contract under its bare name and fills every per-contract
   * mapping. Returns the bare name.
   */
  public addContract(identifier: string, artifact: ContractArtifact): string {
    const name = extractName(identifier)
    this.contractsNames.add(name)
    this.contractsFilenames.set(name, artifact.filename)
    this.abis.set(name, artifact.abi)
    this.bytecodesInit.set(name, artifact.bytecodeInit)
    this.bytecodesRuntime.set(name, artifact.bytecodeRuntime)
    this.srcmapsInit.set(name, artifact.srcmapInit)
    this.srcmapsRuntime.set(name, artifact.srcmapRuntime)
    this.libraries.set(name, artifact.libraries ?? {})
    this.natspec.set(name, artifact.natspec ?? new Natspec())
    return name
  }

  /**
   * Throws when the unit lacks its compiler version or any contract misses an
   * entry in one of the per-contract mappings.
   */
  public assertComplete(): void {
    if (!this._compilerVersion) {
      throw new InvalidCompilation(`Compilation unit "${this.key}" has no compiler version`)
    }
    const mappings: Array<[string, Map<string, unknown>]> = [
      ['filename', this.contractsFilenames],
      ['abi', this.abis],
      ['init bytecode', this.bytecodesInit],
      ['runtime bytecode', this.bytecodesRuntime],
      ['init source map', this.srcmapsInit],
      ['runtime source map', this.srcmapsRuntime],
      ['libraries', this.libraries],
      ['natspec', this.natspec]
    ]
    for (const name of this.contractsNames) {
      for (const [label, mapping] of mappings) {
        if (!mapping.has(name)) {
          throw new InvalidCompilation(`Contract "${name}" in compilation unit "${this.key}" has no ${label}`)
        }
      }
    }
  }

  public filenameOfContract(name: string): Filename {
    return this.lookup(this.contractsFilenames, name)
  }

  public relativeFilenameFromAbsolute(absolute: string): string | undefined {
    for (const filename of this.contractsFilenames.values()) {
      if (filename.absolute === absolute) {
        return filename.relative
      }
    }
    return undefined
  }

  /**
   * Library placeholders of a contract, mapped to library names. Stored
   * libraries win; otherwise placeholders in the bytecode are matched against
   * the contracts of this unit.
   */
  public librariesNamesAndPatterns(name: string): Record<string, string> {
    const stored = this.lookup(this.libraries, name)
    if (Object.keys(stored).length > 0) {
      return { ...stored }
    }

    const placeholders = findPlaceholders(
      this.lookup(this.bytecodesInit, name) + this.lookup(this.bytecodesRuntime, name)
    )
    if (placeholders.length === 0) {
      return {}
    }

    const known = this.knownPlaceholders()
    const result: Record<string, string> = {}
    for (const placeholder of placeholders) {
      const library = known.get(placeholder) ?? legacyPlaceholderName(placeholder)
      if (library !== undefined) {
        result[placeholder] = library
      }
    }
    return result
  }

  /**
   * Init bytecode, optionally linked against `links` (library name -> address).
   */
  public bytecodeInit(name: string, links?: Record<string, string>): string {
    const bytecode = this.lookup(this.bytecodesInit, name)
    return links ? linkBytecode(bytecode, this.librariesNamesAndPatterns(name), links) : bytecode
  }

  public bytecodeRuntime(name: string, links?: Record<string, string>): string {
    const bytecode = this.lookup(this.bytecodesRuntime, name)
    return links ? linkBytecode(bytecode, this.librariesNamesAndPatterns(name), links) : bytecode
  }

  /**
   * Function signature -> 4-byte selector, e.g. `transfer(address,uint256)` -> 0xa9059cbb.
   */
  public hashes(name: string): Record<string, number> {
    const result: Record<string, number> = {}
    const iface = this.interfaceOf(name)
    iface?.forEachFunction((fragment) => {
      result[fragment.format('sighash')] = parseInt(fragment.selector.slice(2), 16)
    })
    return result
  }

  /**
   * Event signature -> topic hash.
   */
  public eventsTopics(name: string): Record<string, string> {
    const result: Record<string, string> = {}
    const iface = this.interfaceOf(name)
    iface?.forEachEvent((fragment) => {
      result[fragment.format('sighash')] = fragment.topicHash
    })
    return result
  }

  private interfaceOf(name: string): Interface | undefined {
    const abi = this.lookup(this.abis, name)
    if (!Array.isArray(abi)) {
      return undefined
    }
    return new Interface(JSON.stringify(abi))
  }

  private knownPlaceholders(): Map<string, string> {
    const known: Map<string, string> = new Map()
    for (const [contract, filename] of this.contractsFilenames) {
      known.set(legacyPlaceholder(contract), contract)
      for (const view of new Set(filename.views())) {
        const fullyQualifiedName = `${view}:${contract}`
        known.set(hashedPlaceholder(fullyQualifiedName), contract)
        known.set(legacyPlaceholder(fullyQualifiedName), contract)
      }
    }
    return known
  }

  private lookup<T>(mapping: Map<string, T>, name: string): T {
    const value = mapping.get(name)
    if (value === undefined) {
      throw new Error(`Unknown contract "${name}" in compilation unit "${this.key}"`)
    }
    return value
  }
}
