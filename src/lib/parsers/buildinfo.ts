import { isJsonObject } from '../types/json'
import { BuildInfo } from '../types/solc'
import { parseSolcOutput } from './solc-output'

/**
 * Parses a build-info file.
 * @returns The build info, or null when the content is not JSON or not a build-info document.
 * @throws InvalidCompilation when it is a build-info document whose contracts are malformed.
 */
export function parseBuildInfo(content: string, filePath: string): BuildInfo | null {
  let data: unknown
  try {
    data = JSON.parse(content)
  } catch {
    // Not valid JSON, so it's not a build-info file
    return null
  }

  if (!isJsonObject(data) || !isJsonObject(data.input) || !isJsonObject(data.output)) {
    return null
  }
  const { _format: format, id, solcVersion, solcLongVersion } = data
  if (format !== 'hh-sol-build-info-1' && format !== 'ethers-rs-sol-build-info-1') {
    return null
  }
  if (typeof id !== 'string' || typeof solcVersion !== 'string' || !isJsonObject(data.output.contracts)) {
    return null
  }

  return {
    _format: format,
    id,
    solcVersion,
    solcLongVersion: typeof solcLongVersion === 'string' ? solcLongVersion : undefined,
    input: data.input,
    output: parseSolcOutput(data.output, filePath)
  }
}

/**
 * Optimizer flag from the compiler input settings, or null when not reported.
 */
export function buildInfoOptimized(buildInfo: BuildInfo): boolean | null {
  const settings = buildInfo.input.settings
  if (!isJsonObject(settings) || !isJsonObject(settings.optimizer)) {
    return null
  }
  const enabled = settings.optimizer.enabled
  return typeof enabled === 'boolean' ? enabled : null
}

/**
 * Checks if a file path looks like a build-info file
 * Follows the conventions: artifacts/build-info/*.json or out/build-info/*.json
 */
export function isBuildInfoFile(filePath: string): boolean {
  return filePath.split('\\').join('/').includes('/build-info/') && filePath.endsWith('.json')
}
