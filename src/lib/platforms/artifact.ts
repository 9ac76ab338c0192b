import { hashedPlaceholder } from '../compilation/libraries'
import { Natspec } from '../compilation/natspec'
import { ContractArtifact, splitSrcmap } from '../compilation/unit'
import { Filename } from '../naming/filename'
import { isJsonObject } from '../types/json'
import { SolcBytecode, SolcContractOutput } from '../types/solc'

/**
 * Placeholder -> library name for every library a bytecode links against,
 * read from solc's `linkReferences` (`file -> library -> offsets`).
 */
export function librariesFromLinkReferences(...bytecodes: SolcBytecode[]): Record<string, string> {
  const libraries: Record<string, string> = {}
  for (const bytecode of bytecodes) {
    const references = bytecode.linkReferences
    if (!isJsonObject(references)) {
      continue
    }
    for (const [file, fileLibraries] of Object.entries(references)) {
      if (!isJsonObject(fileLibraries)) {
        continue
      }
      for (const library of Object.keys(fileLibraries)) {
        libraries[hashedPlaceholder(`${file}:${library}`)] = library
      }
    }
  }
  return libraries
}

/**
 * Maps one solc contract entry onto the unit's per-contract fields.
 */
export function contractArtifactFromSolc(
  filename: Filename,
  contract: SolcContractOutput,
  libraries?: Record<string, string>
): ContractArtifact {
  const { bytecode, deployedBytecode } = contract.evm
  return {
    filename,
    abi: contract.abi,
    bytecodeInit: bytecode.object,
    bytecodeRuntime: deployedBytecode.object,
    srcmapInit: splitSrcmap(bytecode.sourceMap ?? ''),
    srcmapRuntime: splitSrcmap(deployedBytecode.sourceMap ?? ''),
    libraries,
    natspec: Natspec.from(contract.userdoc, contract.devdoc)
  }
}
