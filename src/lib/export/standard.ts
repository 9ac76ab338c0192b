import * as fs from 'fs/promises'
import * as path from 'path'
import type { CompilationSession } from '../compilation/session'
import { CompilerVersion, createCompilerVersion } from '../compilation/compiler-version'
import { Natspec } from '../compilation/natspec'
import { CompilationUnit, joinSrcmap, splitSrcmap } from '../compilation/unit'
import { InvalidCompilation, MalformedArtifactError, errorMessage, ArtifactLocation } from '../errors'
import { compilationEvents } from '../events/emitter'
import { Filename } from '../naming/filename'
import { JsonObject, JsonValue, isJsonObject } from '../types/json'
import { DEFAULT_EXPORT_DIR } from '../types/options'
import { ExportedCompilationUnit, ExportedContract, StandardExport } from '../types/standard'
import { isDirectory, readJsonFile } from '../utils/files'

export const LEGACY_UNIT_KEY = 'legacy'

/**
 * Serializes every compilation unit of a session into the export document.
 */
export async function generateStandardExport(session: CompilationSession): Promise<StandardExport> {
  const compilationUnits: Array<[string, ExportedCompilationUnit]> = []

  for (const [key, unit] of session.compilationUnits) {
    const contracts: Array<[string, ExportedContract]> = []
    for (const name of unit.contractsNames) {
      const filename = unit.filenameOfContract(name)
      const natspec = unit.natspec.get(name) ?? new Natspec()
      contracts.push([name, {
        abi: unit.abis.get(name) ?? [],
        bin: unit.bytecodeInit(name),
        'bin-runtime': unit.bytecodeRuntime(name),
        srcmap: joinSrcmap(unit.srcmapsInit.get(name) ?? []),
        'srcmap-runtime': joinSrcmap(unit.srcmapsRuntime.get(name) ?? []),
        filenames: {
          absolute: filename.absolute,
          used: filename.used,
          short: filename.short,
          relative: filename.relative
        },
        libraries: unit.librariesNamesAndPatterns(name),
        is_dependency: session.isDependency(filename.absolute),
        ...natspec.export()
      }])
    }

    const { compiler, version, optimized } = unit.compilerVersion
    compilationUnits.push([key, {
      compiler: { compiler, version, optimized },
      asts: Object.fromEntries(unit.asts),
      contracts: Object.fromEntries(contracts)
    }])
  }

  return {
    compilation_units: Object.fromEntries(compilationUnits),
    package: session.packageName,
    working_dir: session.workingDir,
    type: session.platform.platformTypeUsed(),
    unit_tests: await session.platform.guessedTests()
  }
}

/**
 * Name of the export file: `contracts` for a project directory, otherwise the
 * last segment of the target.
 */
export async function exportTargetName(target: string): Promise<string> {
  return (await isDirectory(target)) ? 'contracts' : path.basename(target)
}

/**
 * Writes `<exportDir>/<target>.json` and returns the written paths.
 */
export async function exportToStandard(
  session: CompilationSession,
  exportDir: string = DEFAULT_EXPORT_DIR
): Promise<string[]> {
  const output = await generateStandardExport(session)
  await fs.mkdir(exportDir, { recursive: true })

  const filePath = path.join(exportDir, `${await exportTargetName(session.target)}.json`)
  await fs.writeFile(filePath, JSON.stringify(output))

  compilationEvents.emitEvent({
    type: 'export_written',
    level: 'info',
    data: { path: filePath, unitCount: session.compilationUnits.size }
  })
  return [filePath]
}

/**
 * Reads an export document from disk without interpreting it.
 */
export async function loadExportFile(filePath: string): Promise<unknown> {
  try {
    return await readJsonFile(filePath)
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new MalformedArtifactError('$', `is not valid JSON: ${error.message}`)
    }
    throw new InvalidCompilation(`Cannot read ${filePath}: ${errorMessage(error)}`, { cause: error })
  }
}

interface ImportedContract {
  name: string
  filename: Filename
  abi: JsonValue
  bin: string
  binRuntime: string
  srcmap: string
  srcmapRuntime: string
  libraries: Record<string, string>
  isDependency: boolean
  natspec: Natspec
}

interface ImportedUnit {
  key: string
  compilerVersion: CompilerVersion
  asts: Record<string, JsonValue>
  contracts: ImportedContract[]
}

interface ImportedDocument {
  legacy: boolean
  units: ImportedUnit[]
  packageName: string | null
  workingDir: string
  platformType: number
  unitTests: string[]
}

function requireObject(container: JsonObject, key: string, keyPath: string, location?: ArtifactLocation): JsonObject {
  const value = container[key]
  if (value === undefined) {
    throw new MalformedArtifactError(keyPath, 'is missing', location)
  }
  if (!isJsonObject(value)) {
    throw new MalformedArtifactError(keyPath, 'must be an object', location)
  }
  return value
}

function requireString(container: JsonObject, key: string, keyPath: string, location?: ArtifactLocation): string {
  const value = container[key]
  if (value === undefined) {
    throw new MalformedArtifactError(keyPath, 'is missing', location)
  }
  if (typeof value !== 'string') {
    throw new MalformedArtifactError(keyPath, 'must be a string', location)
  }
  return value
}

function optionalObject(container: JsonObject, key: string, keyPath: string, location?: ArtifactLocation): JsonObject {
  return container[key] === undefined ? {} : requireObject(container, key, keyPath, location)
}

function parseLibraries(container: JsonObject, keyPath: string, location: ArtifactLocation): Record<string, string> {
  const libraries: Record<string, string> = {}
  for (const [placeholder, library] of Object.entries(optionalObject(container, 'libraries', keyPath, location))) {
    if (typeof library !== 'string') {
      throw new MalformedArtifactError(`${keyPath}.${placeholder}`, 'must be a string', location)
    }
    libraries[placeholder] = library
  }
  return libraries
}

function parseContract(name: string, value: JsonValue, keyPath: string, unitKey: string): ImportedContract {
  const location = { unitKey, contractName: name }
  if (!isJsonObject(value)) {
    throw new MalformedArtifactError(keyPath, 'must be an object', location)
  }
  if (value.abi === undefined) {
    throw new MalformedArtifactError(`${keyPath}.abi`, 'is missing', location)
  }

  const filenames = requireObject(value, 'filenames', `${keyPath}.filenames`, location)
  const view = (key: string): string => requireString(filenames, key, `${keyPath}.filenames.${key}`, location)
  const filename = new Filename(view('absolute'), view('relative'), view('used'), view('short'))

  const isDependency = value.is_dependency ?? false
  if (typeof isDependency !== 'boolean') {
    throw new MalformedArtifactError(`${keyPath}.is_dependency`, 'must be a boolean', location)
  }

  return {
    name,
    filename,
    abi: value.abi,
    bin: requireString(value, 'bin', `${keyPath}.bin`, location),
    binRuntime: requireString(value, 'bin-runtime', `${keyPath}.bin-runtime`, location),
    srcmap: requireString(value, 'srcmap', `${keyPath}.srcmap`, location),
    srcmapRuntime: requireString(value, 'srcmap-runtime', `${keyPath}.srcmap-runtime`, location),
    libraries: parseLibraries(value, `${keyPath}.libraries`, location),
    isDependency,
    natspec: new Natspec(
      optionalObject(value, 'userdoc', `${keyPath}.userdoc`, location),
      optionalObject(value, 'devdoc', `${keyPath}.devdoc`, location)
    )
  }
}

function parseUnit(key: string, value: JsonValue, keyPath: string): ImportedUnit {
  const location = { unitKey: key }
  if (!isJsonObject(value)) {
    throw new MalformedArtifactError(keyPath, 'must be an object', location)
  }

  const compiler = requireObject(value, 'compiler', `${keyPath}.compiler`, location)
  const optimized = compiler.optimized ?? null
  if (optimized !== null && typeof optimized !== 'boolean') {
    throw new MalformedArtifactError(`${keyPath}.compiler.optimized`, 'must be a boolean or null', location)
  }
  const compilerVersion = createCompilerVersion(
    requireString(compiler, 'compiler', `${keyPath}.compiler.compiler`, location),
    requireString(compiler, 'version', `${keyPath}.compiler.version`, location),
    optimized
  )

  const asts = requireObject(value, 'asts', `${keyPath}.asts`, location)
  const contracts = Object.entries(requireObject(value, 'contracts', `${keyPath}.contracts`, location)).map(
    ([name, contract]) => parseContract(name, contract, `${keyPath}.contracts.${name}`, key)
  )
  return { key, compilerVersion, asts, contracts }
}

function parseDocument(document: unknown): ImportedDocument {
  if (!isJsonObject(document)) {
    throw new MalformedArtifactError('$', 'must be an object')
  }

  const legacy = document.compilation_units === undefined
  const units = legacy
    ? [parseUnit(LEGACY_UNIT_KEY, document, '$')]
    : Object.entries(requireObject(document, 'compilation_units', 'compilation_units')).map(
      ([key, unit]) => parseUnit(key, unit, `compilation_units.${key}`)
    )

  const packageName = document.package ?? null
  if (packageName !== null && typeof packageName !== 'string') {
    throw new MalformedArtifactError('package', 'must be a string or null')
  }

  const platformType = document.type
  if (platformType === undefined) {
    throw new MalformedArtifactError('type', 'is missing')
  }
  if (typeof platformType !== 'number' || !Number.isInteger(platformType)) {
    throw new MalformedArtifactError('type', 'must be an integer')
  }

  const rawTests = document.unit_tests ?? []
  if (!Array.isArray(rawTests)) {
    throw new MalformedArtifactError('unit_tests', 'must be an array')
  }
  const unitTests = rawTests.map((test, index) => {
    if (typeof test !== 'string') {
      throw new MalformedArtifactError(`unit_tests.${index}`, 'must be a string')
    }
    return test
  })

  return {
    legacy,
    units,
    packageName,
    workingDir: requireString(document, 'working_dir', 'working_dir'),
    platformType,
    unitTests
  }
}

/**
 * Populates a session from an export document. The whole document is
 * validated before the session is touched.
 * @returns the platform type recorded in the document and its unit tests.
 * @throws MalformedArtifactError when a required key is missing or mistyped.
 */
export function loadFromCompile(
  session: CompilationSession,
  document: unknown
): { platformType: number; unitTests: string[] } {
  const imported = parseDocument(document)
  for (const { key } of imported.units) {
    if (session.compilationUnits.has(key)) {
      throw new InvalidCompilation(`Duplicate compilation unit "${key}"`)
    }
  }

  for (const importedUnit of imported.units) {
    const unit = new CompilationUnit(importedUnit.key)
    unit.setCompilerVersion(importedUnit.compilerVersion)
    for (const [source, ast] of Object.entries(importedUnit.asts)) {
      unit.asts.set(source, ast)
    }

    for (const contract of importedUnit.contracts) {
      const filename = session.rememberFilename(contract.filename)
      unit.addContract(contract.name, {
        filename,
        abi: contract.abi,
        bytecodeInit: contract.bin,
        bytecodeRuntime: contract.binRuntime,
        srcmapInit: splitSrcmap(contract.srcmap),
        srcmapRuntime: splitSrcmap(contract.srcmapRuntime),
        libraries: contract.libraries,
        natspec: contract.natspec
      })
      if (contract.isDependency) {
        for (const view of [...filename.views(), ...contract.filename.views()]) {
          session.dependencies.add(view)
        }
      }
    }
    session.addCompilationUnit(unit)
  }

  session.rebuildFilenames()
  session.packageName = imported.packageName
  session.workingDir = imported.workingDir

  compilationEvents.emitEvent({
    type: 'artifact_imported',
    level: 'info',
    data: { unitCount: imported.units.length, platformType: imported.platformType, legacy: imported.legacy }
  })
  return { platformType: imported.platformType, unitTests: imported.unitTests }
}
