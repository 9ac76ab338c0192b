import { errorMessage } from '../errors'
import { compilationEvents } from '../events/emitter'
import { CompileOptions } from '../types/options'
import { platformPriority } from '../types/platform'
import { dappDefinition } from './dapp'
import { foundryDefinition } from './foundry'
import { hardhatDefinition } from './hardhat'
import { standardDefinition } from './standard'
import { PlatformDefinition } from './types'
import { waffleDefinition } from './waffle'

/**
 * Table of known build tool adapters, keyed by their integer type tag.
 */
export class PlatformRegistry {
  private readonly platforms: Map<number, PlatformDefinition> = new Map()

  constructor(definitions: PlatformDefinition[] = []) {
    for (const definition of definitions) {
      this.register(definition)
    }
  }

  public register(definition: PlatformDefinition): void {
    const existing = this.platforms.get(definition.type)
    if (existing) {
      throw new Error(
        `Platform type ${definition.type} is already registered by "${existing.name}". ` +
        `"${definition.name}" cannot register a duplicate type.`
      )
    }
    this.platforms.set(definition.type, definition)
  }

  /**
   * Definition for a type tag. Unknown tags resolve to the Standard platform.
   */
  public resolve(type: number): PlatformDefinition {
    const definition = this.platforms.get(type)
    if (definition) {
      return definition
    }
    compilationEvents.emitEvent({
      type: 'unknown_platform_warning',
      level: 'warn',
      data: { platformType: type }
    })
    return this.platforms.get(standardDefinition.type) ?? standardDefinition
  }

  /**
   * All definitions in detection order.
   */
  public getPlatforms(): PlatformDefinition[] {
    return Array.from(this.platforms.values()).sort(
      (a, b) => platformPriority(a.type) - platformPriority(b.type) || a.type - b.type
    )
  }

  /**
   * First platform, in detection order, that supports the target. A probe that
   * throws counts as not supported.
   */
  public async detect(target: string, options: CompileOptions = {}): Promise<PlatformDefinition | undefined> {
    for (const definition of this.getPlatforms()) {
      let supported: boolean
      try {
        supported = await definition.isSupported(target, options)
      } catch (error) {
        compilationEvents.emitEvent({
          type: 'platform_probe_failed',
          level: 'debug',
          data: { platform: definition.name, error: errorMessage(error) }
        })
        supported = false
      }
      if (supported) {
        return definition
      }
    }
    return undefined
  }
}

export function createDefaultRegistry(): PlatformRegistry {
  return new PlatformRegistry([
    foundryDefinition,
    hardhatDefinition,
    waffleDefinition,
    dappDefinition,
    standardDefinition
  ])
}

export const defaultRegistry = createDefaultRegistry()
