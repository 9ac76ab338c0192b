import { getAddress, keccak256, toUtf8Bytes } from 'ethers'

export const PLACEHOLDER_LENGTH = 40

/**
 * solc >= 0.5 placeholder: `__$` + first 34 hex chars of keccak256(fqn) + `$__`.
 */
export function hashedPlaceholder(fullyQualifiedName: string): string {
  return `__$${keccak256(toUtf8Bytes(fullyQualifiedName)).slice(2, 36)}$__`
}

/**
 * Pre-0.5 placeholder: the library name truncated to 36 chars, padded with `_`.
 */
export function legacyPlaceholder(name: string): string {
  return `__${name.slice(0, 36).padEnd(36, '_')}__`
}

/**
 * Lists the distinct unlinked library placeholders found in a bytecode string,
 * in order of first appearance.
 */
export function findPlaceholders(bytecode: string): string[] {
  const found: string[] = []
  let index = bytecode.indexOf('__')
  while (index !== -1 && index + PLACEHOLDER_LENGTH <= bytecode.length) {
    const placeholder = bytecode.slice(index, index + PLACEHOLDER_LENGTH)
    if (!found.includes(placeholder)) {
      found.push(placeholder)
    }
    index = bytecode.indexOf('__', index + PLACEHOLDER_LENGTH)
  }
  return found
}

/**
 * Name a legacy placeholder encodes, e.g. `__Token.sol:SafeMath_______...` -> `SafeMath`.
 */
export function legacyPlaceholderName(placeholder: string): string | undefined {
  if (placeholder.startsWith('__$')) {
    return undefined
  }
  const inner = placeholder.slice(2, PLACEHOLDER_LENGTH - 2).replace(/_+$/, '')
  if (!inner) {
    return undefined
  }
  const separator = inner.lastIndexOf(':')
  return separator === -1 ? inner : inner.slice(separator + 1)
}

/**
 * Replaces placeholders with library addresses.
 * @param patterns placeholder -> library name
 * @param addresses library name -> address; libraries without an address stay unlinked
 */
export function linkBytecode(
  bytecode: string,
  patterns: Record<string, string>,
  addresses: Record<string, string>
): string {
  let linked = bytecode
  for (const [placeholder, library] of Object.entries(patterns)) {
    const address = addresses[library]
    if (address === undefined) {
      continue
    }
    // getAddress throws on anything that is not a valid address
    const hex = getAddress(address).slice(2).toLowerCase()
    linked = linked.split(placeholder).join(hex)
  }
  return linked
}
