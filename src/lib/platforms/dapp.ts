import * as fs from 'fs/promises'
import * as path from 'path'
import type { CompilationSession } from '../compilation/session'
import { createCompilerVersion, extractSemver } from '../compilation/compiler-version'
import { CompilationUnit } from '../compilation/unit'
import { InvalidCompilation, errorMessage } from '../errors'
import { stripRoots } from '../naming/filename'
import { parseSolcOutput } from '../parsers/solc-output'
import { isJsonObject } from '../types/json'
import { CompileOptions } from '../types/options'
import { PlatformType } from '../types/platform'
import { SolcContractOutput } from '../types/solc'
import { readJsonFile } from '../utils/files'
import { contractArtifactFromSolc } from './artifact'
import { runTool } from './process'
import { AbstractPlatform, PlatformDefinition, hasPathSegment } from './types'

const NAME = 'Dapp'
const PROJECT_URL = 'https://github.com/dapphub/dapptools'

export const dappShortPath = stripRoots('src', 'lib')

interface ContractMetadata {
  optimized?: boolean
  compilerVersion?: string
}

function readMetadata(contract: SolcContractOutput, origin: string): ContractMetadata {
  if (contract.metadata === undefined) {
    return {}
  }
  let metadata: unknown
  try {
    metadata = JSON.parse(contract.metadata)
  } catch (error) {
    throw new InvalidCompilation(`${origin}: unreadable contract metadata: ${errorMessage(error)}`, { cause: error })
  }
  if (!isJsonObject(metadata)) {
    return {}
  }
  const result: ContractMetadata = {}
  const { settings, compiler } = metadata
  if (isJsonObject(settings) && isJsonObject(settings.optimizer) && typeof settings.optimizer.enabled === 'boolean') {
    result.optimized = settings.optimizer.enabled
  }
  if (isJsonObject(compiler) && typeof compiler.version === 'string') {
    result.compilerVersion = compiler.version
  }
  return result
}

export class Dapp extends AbstractPlatform {
  readonly name = NAME
  readonly projectUrl = PROJECT_URL
  readonly type = PlatformType.DAPP

  async compile(session: CompilationSession): Promise<void> {
    if (!this.shouldSkipCompile(this.options.dappIgnoreCompile)) {
      await runTool('dapp', ['build'], this.target)
    }

    const outputPath = this.resolveInTarget('out', 'dapp.sol.json')
    let raw: unknown
    try {
      raw = await readJsonFile(outputPath)
    } catch (error) {
      throw new InvalidCompilation(`Cannot read ${outputPath}: ${errorMessage(error)}`, { cause: error })
    }
    const output = parseSolcOutput(raw, outputPath)

    const unit = new CompilationUnit(this.target)
    let version = output.version !== undefined ? extractSemver(output.version) : undefined
    // Any optimized contract marks the whole unit optimized
    let optimized = false

    for (const [sourcePath, contracts] of Object.entries(output.contracts)) {
      const filename = session.resolveFilename(sourcePath, dappShortPath)
      for (const [contractName, contract] of Object.entries(contracts)) {
        const metadata = readMetadata(contract, outputPath)
        optimized = optimized || metadata.optimized === true
        if (version === undefined && metadata.compilerVersion !== undefined) {
          version = extractSemver(metadata.compilerVersion)
        }
        unit.addContract(contractName, contractArtifactFromSolc(filename, contract))
      }
    }

    for (const [sourcePath, source] of Object.entries(output.sources)) {
      const filename = session.resolveFilename(sourcePath, dappShortPath)
      const ast = source.ast ?? source.AST
      if (ast !== undefined) {
        unit.asts.set(filename.absolute, ast)
      }
    }

    if (version === undefined) {
      throw new InvalidCompilation(`${outputPath}: compiler version not found`)
    }
    unit.setCompilerVersion(createCompilerVersion('solc', version, optimized))
    session.addCompilationUnit(unit)
  }

  protected isDependencyPath(filePath: string): boolean {
    return hasPathSegment(filePath, 'lib')
  }

  protected platformGuessedTests(): string[] {
    return ['dapp test']
  }
}

export const dappDefinition: PlatformDefinition = {
  name: NAME,
  projectUrl: PROJECT_URL,
  type: PlatformType.DAPP,

  async isSupported(target: string, options: CompileOptions): Promise<boolean> {
    if (options.dappIgnore) {
      return false
    }
    try {
      const makefile = await fs.readFile(path.join(target, 'Makefile'), 'utf-8')
      return makefile.includes('dapp ')
    } catch {
      return false
    }
  },

  create(target: string, options: CompileOptions) {
    return new Dapp(target, options)
  }
}
