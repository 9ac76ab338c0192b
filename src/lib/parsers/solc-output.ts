import { InvalidCompilation } from '../errors'
import { isJsonObject } from '../types/json'
import { SolcBytecode, SolcContractOutput, SolcOutput, SolcSourceOutput } from '../types/solc'

function isBytecode(value: unknown): value is SolcBytecode {
  return (
    isJsonObject(value) &&
    typeof value.object === 'string' &&
    (value.sourceMap === undefined || typeof value.sourceMap === 'string')
  )
}

/**
 * A contract entry is usable when it carries an ABI and both bytecodes.
 */
export function isSolcContractOutput(value: unknown): value is SolcContractOutput {
  return (
    isJsonObject(value) &&
    value.abi !== undefined &&
    (value.metadata === undefined || typeof value.metadata === 'string') &&
    isJsonObject(value.evm) &&
    isBytecode(value.evm.bytecode) &&
    isBytecode(value.evm.deployedBytecode)
  )
}

/**
 * Validates a flat `identifier -> contract` mapping, as found in solc's
 * combined JSON where identifiers look like `contracts/A.sol:A`.
 */
export function parseContractMap(value: unknown, origin: string): Record<string, SolcContractOutput> {
  if (!isJsonObject(value)) {
    throw new InvalidCompilation(`${origin}: "contracts" is missing or not an object`)
  }
  const contracts: Record<string, SolcContractOutput> = {}
  for (const [identifier, contract] of Object.entries(value)) {
    if (!isSolcContractOutput(contract)) {
      throw new InvalidCompilation(`${origin}: contract "${identifier}" lacks its abi or bytecode`)
    }
    contracts[identifier] = contract
  }
  return contracts
}

export function parseSources(value: unknown): Record<string, SolcSourceOutput> {
  const sources: Record<string, SolcSourceOutput> = {}
  if (!isJsonObject(value)) {
    return sources
  }
  for (const [sourcePath, entry] of Object.entries(value)) {
    if (!isJsonObject(entry)) {
      continue
    }
    const source: SolcSourceOutput = {}
    if (typeof entry.id === 'number') source.id = entry.id
    if (entry.ast !== undefined) source.ast = entry.ast
    if (entry.AST !== undefined) source.AST = entry.AST
    sources[sourcePath] = source
  }
  return sources
}

/**
 * Validates solc standard JSON output (`contracts` nested by source file).
 */
export function parseSolcOutput(value: unknown, origin: string): SolcOutput {
  if (!isJsonObject(value)) {
    throw new InvalidCompilation(`${origin}: compiler output is not a JSON object`)
  }
  if (!isJsonObject(value.contracts)) {
    throw new InvalidCompilation(`${origin}: "contracts" is missing or not an object`)
  }
  const contracts: Record<string, Record<string, SolcContractOutput>> = {}
  for (const [sourcePath, fileContracts] of Object.entries(value.contracts)) {
    contracts[sourcePath] = parseContractMap(fileContracts, `${origin} (${sourcePath})`)
  }
  return {
    version: typeof value.version === 'string' ? value.version : undefined,
    contracts,
    sources: parseSources(value.sources)
  }
}
