import { JsonObject, JsonValue } from './json'

export interface SolcBytecode {
  object: string
  sourceMap?: string
  // file -> library -> offsets; only the keys are read
  linkReferences?: JsonValue
}

export interface SolcContractOutput {
  abi: JsonValue
  metadata?: string
  userdoc?: JsonValue
  devdoc?: JsonValue
  evm: {
    bytecode: SolcBytecode
    deployedBytecode: SolcBytecode
  }
}

export interface SolcSourceOutput {
  id?: number
  ast?: JsonValue
  // solc's legacy combined JSON capitalizes the key
  AST?: JsonValue
}

/**
 * The subset of solc's standard JSON output the adapters read.
 */
export interface SolcOutput {
  version?: string
  contracts: Record<string, Record<string, SolcContractOutput>>
  sources: Record<string, SolcSourceOutput>
}

export type BuildInfoFormat = 'hh-sol-build-info-1' | 'ethers-rs-sol-build-info-1'

export interface BuildInfo {
  _format: BuildInfoFormat
  id: string
  solcVersion: string
  solcLongVersion?: string
  // solc standard JSON input; only `settings.optimizer` is read
  input: JsonObject
  output: SolcOutput
}
