/**
 * Fatal failure of a build tool adapter: the tool could not run, its output is
 * missing, or its configuration cannot be read.
 */
export class InvalidCompilation extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'InvalidCompilation'
  }
}

export class PathResolutionError extends Error {
  constructor(
    message: string,
    public readonly rawPath: string,
    public readonly workingDir: string
  ) {
    super(message)
    this.name = 'PathResolutionError'
  }
}

export interface ArtifactLocation {
  unitKey?: string
  contractName?: string
}

/**
 * Raised when an export document lacks a required key or carries a value of the
 * wrong type. `keyPath` is the dotted path of the offending key.
 */
export class MalformedArtifactError extends Error {
  public readonly unitKey?: string
  public readonly contractName?: string

  constructor(
    public readonly keyPath: string,
    problem: string,
    location: ArtifactLocation = {}
  ) {
    const where = [
      location.unitKey !== undefined ? `unit "${location.unitKey}"` : undefined,
      location.contractName !== undefined ? `contract "${location.contractName}"` : undefined
    ].filter((part): part is string => part !== undefined)
    const suffix = where.length > 0 ? ` (${where.join(', ')})` : ''
    super(`Malformed artifact: ${keyPath} ${problem}${suffix}`)
    this.name = 'MalformedArtifactError'
    this.unitKey = location.unitKey
    this.contractName = location.contractName
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
