import { randomBytes } from 'crypto'
import * as fs from 'fs/promises'
import * as path from 'path'
import type { CompilationSession } from '../compilation/session'
import { createCompilerVersion, extractSemver } from '../compilation/compiler-version'
import { CompilationUnit } from '../compilation/unit'
import { InvalidCompilation, errorMessage } from '../errors'
import { compilationEvents } from '../events/emitter'
import { extractName, stripRoots } from '../naming/filename'
import { parseContractMap, parseSources } from '../parsers/solc-output'
import { JsonObject, JsonValue, isJsonObject } from '../types/json'
import { CompileOptions } from '../types/options'
import { PlatformType } from '../types/platform'
import { findFiles, isDirectory, pathExists, readJsonFile } from '../utils/files'
import { contractArtifactFromSolc } from './artifact'
import { runTool } from './process'
import { AbstractPlatform, PlatformDefinition, hasPathSegment } from './types'

const NAME = 'Waffle'
const PROJECT_URL = 'https://github.com/EthWorks/Waffle'
const HARDHAT_CONFIGS = ['hardhat.config.js', 'hardhat.config.ts', 'hardhat.config.cjs', 'hardhat.config.mjs']
const COMBINED_JSON = 'Combined-Json.json'

export const waffleShortPath = stripRoots('contracts', 'node_modules')

const REQUIRED_CONTRACT_OUTPUTS = [
  'evm.bytecode.object',
  'evm.deployedBytecode.object',
  'abi',
  'evm.bytecode.sourceMap',
  'evm.deployedBytecode.sourceMap'
]
const REQUIRED_SOURCE_OUTPUTS = ['ast']

function requiredSelection(): JsonObject {
  return { '*': [...REQUIRED_CONTRACT_OUTPUTS], '': [...REQUIRED_SOURCE_OUTPUTS] }
}

function mergeOutputs(current: JsonValue | undefined, required: string[]): JsonValue[] {
  return Array.isArray(current) ? [...current, ...required] : [...required]
}

/**
 * Returns a copy of a waffle config that asks the compiler for every output
 * the adapter reads, keeping whatever selection the project already has.
 */
export function withRequiredOutputs(config: JsonObject): JsonObject {
  const result: JsonObject = { ...config, outputType: 'all' }
  const compilerOptions = isJsonObject(config.compilerOptions) ? { ...config.compilerOptions } : {}
  const outputSelection = isJsonObject(compilerOptions.outputSelection) ? { ...compilerOptions.outputSelection } : {}

  if (isJsonObject(outputSelection['*'])) {
    const all = outputSelection['*']
    outputSelection['*'] = {
      ...all,
      '*': mergeOutputs(all['*'], REQUIRED_CONTRACT_OUTPUTS),
      '': mergeOutputs(all[''], REQUIRED_SOURCE_OUTPUTS)
    }
  } else {
    outputSelection['*'] = requiredSelection()
  }

  compilerOptions.outputSelection = outputSelection
  result.compilerOptions = compilerOptions
  return result
}

/**
 * Reads a waffle JSON config. JavaScript configs cannot be evaluated here.
 */
export async function loadWaffleConfig(configFile: string): Promise<JsonObject> {
  const content = await fs.readFile(configFile, 'utf-8')
  if (content.includes('module.exports')) {
    throw new InvalidCompilation(`${configFile}: module.exports configs are not supported for waffle`)
  }
  let config: unknown
  try {
    config = JSON.parse(content)
  } catch (error) {
    throw new InvalidCompilation(`${configFile}: invalid JSON: ${errorMessage(error)}`, { cause: error })
  }
  if (!isJsonObject(config)) {
    throw new InvalidCompilation(`${configFile}: config must be a JSON object`)
  }
  return config
}

function firstSemver(text: string, origin: string): string {
  const version = extractSemver(text)
  if (version === undefined) {
    throw new InvalidCompilation(`Solidity version not found in ${origin}`)
  }
  return version
}

/**
 * Compiler version of a waffle project, from the config when it says, or
 * from the compiler binary itself.
 */
export async function discoverWaffleVersion(compiler: string, cwd: string, config: JsonObject): Promise<string> {
  if (typeof config.compilerVersion === 'string') {
    return config.compilerVersion
  }
  if (typeof config.solcVersion === 'string') {
    return firstSemver(config.solcVersion, 'solcVersion')
  }
  if (compiler === 'dockerized-solc') {
    const tag = config['docker-tag']
    if (typeof tag !== 'string') {
      throw new InvalidCompilation('Solidity version not found: dockerized-solc requires "docker-tag"')
    }
    return tag
  }
  if (compiler === 'native') {
    const { stdout } = await runTool('solc', ['--version'], cwd)
    const line = stdout.split('\n').find((candidate) => candidate.includes('Version'))
    return firstSemver(line ?? '', '`solc --version`')
  }
  if (compiler === 'solc-js') {
    const { stdout } = await runTool('solcjs', ['--version'], cwd)
    return firstSemver(stdout, '`solcjs --version`')
  }
  throw new InvalidCompilation(`Solidity version not found for compiler ${compiler}`)
}

export class Waffle extends AbstractPlatform {
  readonly name = NAME
  readonly projectUrl = PROJECT_URL
  readonly type = PlatformType.WAFFLE

  async compile(session: CompilationSession): Promise<void> {
    const configFile = await this.findConfigFile()
    const config = (await pathExists(configFile)) ? await loadWaffleConfig(configFile) : {}

    // `compiler` is the pre-3.0 spelling of `compilerType`
    const compilerSetting = config.compilerType ?? config.compiler
    const compiler = typeof compilerSetting === 'string' ? compilerSetting : 'native'
    const version = await discoverWaffleVersion(compiler, this.target, config)
    const buildDirectory = typeof config.targetPath === 'string' ? config.targetPath : 'build'

    if (!this.shouldSkipCompile(this.options.waffleIgnoreCompile)) {
      await this.runWaffle(withRequiredOutputs(config))
    }

    const buildPath = this.resolveInTarget(buildDirectory)
    if (!(await isDirectory(buildPath))) {
      throw new InvalidCompilation(`\`waffle\` compilation failed: build directory ${buildPath} not found`)
    }
    const combinedPath = path.join(buildPath, COMBINED_JSON)
    if (!(await pathExists(combinedPath))) {
      throw new InvalidCompilation(`\`${COMBINED_JSON}\` not found in ${buildPath}`)
    }

    let combined: unknown
    try {
      combined = await readJsonFile(combinedPath)
    } catch (error) {
      throw new InvalidCompilation(`Cannot read ${combinedPath}: ${errorMessage(error)}`, { cause: error })
    }
    if (!isJsonObject(combined)) {
      throw new InvalidCompilation(`${combinedPath}: not a JSON object`)
    }

    const contracts = parseContractMap(combined.contracts, combinedPath)
    const sources = parseSources(combined.sources)
    const unit = new CompilationUnit(this.target)

    for (const [identifier, contract] of Object.entries(contracts)) {
      const separator = identifier.lastIndexOf(':')
      if (separator === -1) {
        throw new InvalidCompilation(`${combinedPath}: contract identifier "${identifier}" has no source file`)
      }
      const sourcePath = identifier.slice(0, separator)
      const filename = session.resolveFilename(sourcePath, waffleShortPath)
      const ast = sources[sourcePath]?.AST ?? sources[sourcePath]?.ast
      if (ast !== undefined) {
        unit.asts.set(filename.absolute, ast)
      }
      unit.addContract(extractName(identifier), contractArtifactFromSolc(filename, contract))
    }

    unit.setCompilerVersion(createCompilerVersion(compiler, version, null))
    session.addCompilationUnit(unit)
  }

  protected isDependencyPath(filePath: string): boolean {
    return hasPathSegment(filePath, 'node_modules')
  }

  protected platformGuessedTests(): string[] {
    return ['npx mocha']
  }

  /**
   * A single `*waffle*.json` anywhere in the project wins over the configured name.
   */
  private async findConfigFile(): Promise<string> {
    const candidates = await findFiles(this.target, (name) => name.includes('waffle') && name.endsWith('.json'))
    if (candidates.length === 1) {
      return candidates[0]
    }
    return this.resolveInTarget(this.options.waffleConfigFile ?? 'waffle.json')
  }

  private async runWaffle(config: JsonObject): Promise<void> {
    const configName = `.solcanon-waffle-${randomBytes(6).toString('hex')}.json`
    const configPath = this.resolveInTarget(configName)
    await fs.writeFile(configPath, JSON.stringify(config))
    compilationEvents.emitEvent({
      type: 'temporary_file_created',
      level: 'debug',
      data: { path: configPath }
    })

    const command = this.options.npxDisable ? ['waffle', configName] : ['npx', 'waffle', configName]
    try {
      await runTool(command[0], command.slice(1), this.target)
    } finally {
      await fs.rm(configPath, { force: true })
    }
  }
}

async function dependsOnWaffle(target: string): Promise<boolean> {
  const manifest = await readJsonFile(path.join(target, 'package.json')).catch(() => undefined)
  if (!isJsonObject(manifest)) {
    return false
  }
  return [manifest.dependencies, manifest.devDependencies].some(
    (dependencies) => isJsonObject(dependencies) && 'ethereum-waffle' in dependencies
  )
}

export const waffleDefinition: PlatformDefinition = {
  name: NAME,
  projectUrl: PROJECT_URL,
  type: PlatformType.WAFFLE,

  async isSupported(target: string, options: CompileOptions): Promise<boolean> {
    if (options.waffleIgnore) {
      return false
    }
    for (const config of HARDHAT_CONFIGS) {
      if (await pathExists(path.join(target, config))) {
        return false
      }
    }
    if (await pathExists(path.join(target, 'waffle.json'))) {
      return true
    }
    return dependsOnWaffle(target)
  },

  create(target: string, options: CompileOptions) {
    return new Waffle(target, options)
  }
}
