export interface CompilerVersion {
  readonly compiler: string
  readonly version: string
  // null when the tool does not report optimizer settings
  readonly optimized: boolean | null
}

export function createCompilerVersion(compiler: string, version: string, optimized: boolean | null): CompilerVersion {
  return Object.freeze({ compiler, version, optimized })
}

/**
 * Returns the first `major.minor.patch` found in a version banner such as
 * `0.8.19+commit.7dd6d404` or `Version: 0.6.12+commit.27d51765.Linux.g++`.
 */
export function extractSemver(text: string): string | undefined {
  const match = /\d+\.\d+\.\d+/.exec(text)
  return match ? match[0] : undefined
}
