export const DEFAULT_EXPORT_DIR = 'crytic-export'

/**
 * Options understood by the compile pipeline. Every field is optional and
 * unknown keys coming from a config file are dropped by the config loader.
 */
export interface CompileOptions {
  exportDir?: string
  // Skip invoking any build tool and only read its existing output
  ignoreCompile?: boolean
  // Run node-based tools directly instead of through npx
  npxDisable?: boolean

  dappIgnore?: boolean
  dappIgnoreCompile?: boolean

  waffleIgnore?: boolean
  waffleIgnoreCompile?: boolean
  waffleConfigFile?: string

  hardhatIgnore?: boolean
  hardhatIgnoreCompile?: boolean
  hardhatArtifactsDirectory?: string

  foundryIgnore?: boolean
  foundryIgnoreCompile?: boolean
  foundryOutDirectory?: string

  standardIgnore?: boolean
}
