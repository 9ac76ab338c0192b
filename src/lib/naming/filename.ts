import * as fs from 'fs'
import * as path from 'path'
import { PathResolutionError } from '../errors'

/**
 * Four views of one source file. Two Filenames denote the same file iff their
 * `absolute` forms match; `used` and `short` depend on the reporting tool.
 */
export class Filename {
  constructor(
    public readonly absolute: string,
    public readonly relative: string,
    public readonly used: string,
    public readonly short: string
  ) {
    Object.freeze(this)
  }

  public views(): [string, string, string, string] {
    return [this.absolute, this.relative, this.short, this.used]
  }

  public equals(other: Filename): boolean {
    return this.absolute === other.absolute
  }
}

/**
 * Maps a working-dir-relative posix path to the tool-specific short form.
 */
export type ShortPathRule = (relative: string) => string

export const identityShortPath: ShortPathRule = (relative) => relative

/**
 * Builds a rule that strips the first matching root directory, trying the
 * roots in the given order. `stripRoots('src', 'lib')` turns `src/lib/A.sol`
 * into `lib/A.sol`.
 */
export function stripRoots(...roots: string[]): ShortPathRule {
  return (relative: string): string => {
    for (const root of roots) {
      const prefix = root.endsWith('/') ? root : `${root}/`
      if (relative.startsWith(prefix)) {
        return relative.slice(prefix.length)
      }
    }
    return relative
  }
}

/**
 * Strips a fully-qualified prefix: `contracts/Token.sol:Token` -> `Token`.
 */
export function extractName(identifier: string): string {
  const separator = identifier.lastIndexOf(':')
  return separator === -1 ? identifier : identifier.slice(separator + 1)
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/')
}

function stripPackage(rawPath: string, packageName?: string): string {
  if (packageName && rawPath.startsWith(`${packageName}/`)) {
    return rawPath.slice(packageName.length + 1)
  }
  return rawPath
}

export interface FilenameResolverOptions {
  exists?: (candidate: string) => boolean
}

/**
 * Resolves raw paths reported by build tools into Filename identities and
 * returns the same instance for every later reference to an already seen file.
 * The cache is append-only for the lifetime of its session.
 */
export class FilenameResolver {
  private readonly byAbsolute: Map<string, Filename> = new Map()
  private readonly exists: (candidate: string) => boolean

  constructor(options: FilenameResolverOptions = {}) {
    this.exists = options.exists ?? fs.existsSync
  }

  /**
   * @param packageName when set, a leading `<packageName>/` segment is dropped from the raw path
   */
  public resolve(rawPath: string, shortRule: ShortPathRule, workingDir: string, packageName?: string): Filename {
    if (!workingDir) {
      throw new PathResolutionError(`Cannot resolve "${rawPath}": working directory is not set`, rawPath, workingDir)
    }
    if (!rawPath) {
      throw new PathResolutionError('Cannot resolve an empty path', rawPath, workingDir)
    }

    const root = path.resolve(workingDir)
    const absolute = this.locate(stripPackage(rawPath, packageName), root)
    if (absolute === undefined) {
      throw new PathResolutionError(`Unknown file: ${rawPath} (working directory: ${root})`, rawPath, workingDir)
    }

    const known = this.byAbsolute.get(absolute)
    if (known) {
      return known
    }

    const relative = toPosix(path.relative(root, absolute))
    const filename = new Filename(absolute, relative, rawPath, shortRule(relative))
    this.byAbsolute.set(absolute, filename)
    return filename
  }

  /**
   * Registers a Filename built elsewhere (e.g. read back from an export) so
   * later resolutions of the same absolute path return it.
   */
  public remember(filename: Filename): Filename {
    const known = this.byAbsolute.get(filename.absolute)
    if (known) {
      return known
    }
    this.byAbsolute.set(filename.absolute, filename)
    return filename
  }

  public get size(): number {
    return this.byAbsolute.size
  }

  private locate(rawPath: string, root: string): string | undefined {
    const candidates = [
      path.resolve(root, rawPath),
      // Imports such as `@openzeppelin/...` are reported without their install root
      path.join(root, 'node_modules', rawPath),
      path.join(root, 'contracts', rawPath)
    ]
    return candidates.find((candidate) => this.exists(candidate))
  }
}
