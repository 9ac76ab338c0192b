import { JsonObject, JsonValue } from './json'

export interface ExportedFilenames {
  absolute: string
  used: string
  short: string
  relative: string
}

export interface ExportedContract {
  abi: JsonValue
  bin: string
  'bin-runtime': string
  srcmap: string
  'srcmap-runtime': string
  filenames: ExportedFilenames
  libraries: Record<string, string>
  is_dependency: boolean
  userdoc: JsonObject
  devdoc: JsonObject
}

export interface ExportedCompiler {
  compiler: string
  version: string
  optimized: boolean | null
}

export interface ExportedCompilationUnit {
  compiler: ExportedCompiler
  asts: Record<string, JsonValue>
  contracts: Record<string, ExportedContract>
}

/**
 * The multi-unit export document.
 */
export interface StandardExport {
  compilation_units: Record<string, ExportedCompilationUnit>
  package: string | null
  working_dir: string
  type: number
  unit_tests: string[]
}

/**
 * Older single-unit document: the unit fields sit at the top level and
 * `package`/`unit_tests` may be absent.
 */
export interface LegacyStandardExport extends ExportedCompilationUnit {
  package?: string | null
  working_dir: string
  type: number
  unit_tests?: string[]
}
