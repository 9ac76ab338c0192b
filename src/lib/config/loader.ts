import * as fs from 'fs/promises'
import * as path from 'path'
import { parse as parseYaml } from 'yaml'
import { InvalidCompilation, errorMessage } from '../errors'
import { compilationEvents } from '../events/emitter'
import { isJsonObject } from '../types/json'
import { CompileOptions } from '../types/options'

type OptionKey = keyof CompileOptions

const OPTION_KINDS: Record<OptionKey, 'boolean' | 'string'> = {
  exportDir: 'string',
  ignoreCompile: 'boolean',
  npxDisable: 'boolean',
  dappIgnore: 'boolean',
  dappIgnoreCompile: 'boolean',
  waffleIgnore: 'boolean',
  waffleIgnoreCompile: 'boolean',
  waffleConfigFile: 'string',
  hardhatIgnore: 'boolean',
  hardhatIgnoreCompile: 'boolean',
  hardhatArtifactsDirectory: 'string',
  foundryIgnore: 'boolean',
  foundryIgnoreCompile: 'boolean',
  foundryOutDirectory: 'string',
  standardIgnore: 'boolean'
}

const CONFIG_FILES = ['solcanon.config.json', 'solcanon.config.yml', 'solcanon.config.yaml']

function isOptionKey(key: string): key is OptionKey {
  return Object.prototype.hasOwnProperty.call(OPTION_KINDS, key)
}

/**
 * `hardhat_ignore_compile` -> `hardhatIgnoreCompile`; camelCase passes through.
 */
export function toCamelCase(key: string): string {
  return key.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase())
}

function assignOption(options: CompileOptions, key: OptionKey, value: boolean | string): void {
  switch (key) {
    case 'exportDir':
    case 'waffleConfigFile':
    case 'hardhatArtifactsDirectory':
    case 'foundryOutDirectory':
      if (typeof value === 'string') options[key] = value
      return
    default:
      if (typeof value === 'boolean') options[key] = value
  }
}

export interface NormalizedOptions {
  options: CompileOptions
  ignoredKeys: string[]
}

/**
 * Validates raw config data into compile options. Keys may be snake_case or
 * camelCase; unknown keys are reported and dropped.
 * @throws InvalidCompilation on a value of the wrong type.
 */
export function normalizeCompileOptions(raw: unknown, origin: string = 'config'): NormalizedOptions {
  if (raw === null || raw === undefined) {
    return { options: {}, ignoredKeys: [] }
  }
  if (!isJsonObject(raw)) {
    throw new InvalidCompilation(`${origin}: expected a mapping of options`)
  }

  const options: CompileOptions = {}
  const ignoredKeys: string[] = []
  for (const [rawKey, value] of Object.entries(raw)) {
    const key = toCamelCase(rawKey)
    if (!isOptionKey(key)) {
      ignoredKeys.push(rawKey)
      continue
    }
    const kind = OPTION_KINDS[key]
    if (typeof value !== kind || (typeof value !== 'string' && typeof value !== 'boolean')) {
      throw new InvalidCompilation(`${origin}: option "${rawKey}" must be a ${kind}`)
    }
    assignOption(options, key, value)
  }
  return { options, ignoredKeys }
}

async function findConfigFile(projectRoot: string): Promise<string | undefined> {
  for (const candidate of CONFIG_FILES) {
    const fullPath = path.join(projectRoot, candidate)
    try {
      await fs.access(fullPath)
      return fullPath
    } catch {
      // Try next candidate
    }
  }
  return undefined
}

/**
 * Reads compile options from `configPath`, or from the first
 * `solcanon.config.{json,yml,yaml}` found in the project root. No file means
 * no options.
 */
export async function loadCompileConfig(projectRoot: string, configPath?: string): Promise<CompileOptions> {
  const filePath = configPath ? path.resolve(projectRoot, configPath) : await findConfigFile(projectRoot)
  if (!filePath) {
    return {}
  }

  let content: string
  try {
    content = await fs.readFile(filePath, 'utf-8')
  } catch (error) {
    throw new InvalidCompilation(`Cannot read config file ${filePath}: ${errorMessage(error)}`, { cause: error })
  }

  let raw: unknown
  try {
    // JSON is a subset of YAML
    raw = parseYaml(content)
  } catch (error) {
    throw new InvalidCompilation(`Cannot parse config file ${filePath}: ${errorMessage(error)}`, { cause: error })
  }

  const { options, ignoredKeys } = normalizeCompileOptions(raw, filePath)
  compilationEvents.emitEvent({
    type: 'config_loaded',
    level: 'debug',
    data: { path: filePath, ignoredKeys }
  })
  return options
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined
  const normalized = value.trim().toLowerCase()
  if (['1', 'true', 'yes'].includes(normalized)) return true
  if (['0', 'false', 'no', ''].includes(normalized)) return false
  return undefined
}

/**
 * Defaults taken from `SOLCANON_EXPORT_DIR` and `SOLCANON_NPX_DISABLE`.
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): CompileOptions {
  const options: CompileOptions = {}
  if (env.SOLCANON_EXPORT_DIR) {
    options.exportDir = env.SOLCANON_EXPORT_DIR
  }
  const npxDisable = parseFlag(env.SOLCANON_NPX_DISABLE)
  if (npxDisable !== undefined) {
    options.npxDisable = npxDisable
  }
  return options
}

function definedOnly(options: CompileOptions): CompileOptions {
  const result: CompileOptions = {}
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined && isOptionKey(key) && (typeof value === 'string' || typeof value === 'boolean')) {
      assignOption(result, key, value)
    }
  }
  return result
}

/**
 * Merges option layers: CLI flags over the config file over the environment.
 */
export function resolveCompileOptions(
  cli: CompileOptions,
  file: CompileOptions = {},
  env: CompileOptions = {}
): CompileOptions {
  return { ...definedOnly(env), ...definedOnly(file), ...definedOnly(cli) }
}
