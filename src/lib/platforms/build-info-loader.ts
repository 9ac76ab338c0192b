import * as fs from 'fs/promises'
import * as path from 'path'
import type { CompilationSession } from '../compilation/session'
import { createCompilerVersion, extractSemver } from '../compilation/compiler-version'
import { CompilationUnit } from '../compilation/unit'
import { InvalidCompilation } from '../errors'
import { ShortPathRule } from '../naming/filename'
import { buildInfoOptimized, isBuildInfoFile, parseBuildInfo } from '../parsers/buildinfo'
import { BuildInfo } from '../types/solc'
import { isDirectory } from '../utils/files'
import { contractArtifactFromSolc, librariesFromLinkReferences } from './artifact'

/**
 * Turns one build-info document into a compilation unit keyed by its id.
 */
export function unitFromBuildInfo(
  session: CompilationSession,
  buildInfo: BuildInfo,
  shortRule: ShortPathRule
): CompilationUnit {
  const unit = new CompilationUnit(buildInfo.id)
  const version = extractSemver(buildInfo.solcVersion) ?? buildInfo.solcVersion
  unit.setCompilerVersion(createCompilerVersion('solc', version, buildInfoOptimized(buildInfo)))

  for (const [sourcePath, source] of Object.entries(buildInfo.output.sources)) {
    const filename = session.resolveFilename(sourcePath, shortRule)
    const ast = source.ast ?? source.AST
    if (ast !== undefined) {
      unit.asts.set(filename.absolute, ast)
    }
  }

  for (const [sourcePath, contracts] of Object.entries(buildInfo.output.contracts)) {
    const filename = session.resolveFilename(sourcePath, shortRule)
    for (const [name, contract] of Object.entries(contracts)) {
      const libraries = librariesFromLinkReferences(contract.evm.bytecode, contract.evm.deployedBytecode)
      unit.addContract(name, contractArtifactFromSolc(filename, contract, libraries))
    }
  }
  return unit
}

/**
 * Loads every build-info file of `directory` into the session, one unit each.
 * @throws InvalidCompilation when the directory is missing or holds no build info.
 */
export async function loadBuildInfoDirectory(
  session: CompilationSession,
  directory: string,
  shortRule: ShortPathRule,
  toolName: string
): Promise<void> {
  if (!(await isDirectory(directory))) {
    throw new InvalidCompilation(`\`${toolName}\` build info directory ${directory} not found`)
  }

  const files = (await fs.readdir(directory))
    .map((file) => path.join(directory, file))
    .filter(isBuildInfoFile)
    .sort()
  let loaded = 0
  for (const filePath of files) {
    const buildInfo = parseBuildInfo(await fs.readFile(filePath, 'utf-8'), filePath)
    if (!buildInfo) {
      continue
    }
    session.addCompilationUnit(unitFromBuildInfo(session, buildInfo, shortRule))
    loaded++
  }

  if (loaded === 0) {
    throw new InvalidCompilation(`No build info found in ${directory}`)
  }
}
