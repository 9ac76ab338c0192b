/**
 * Integer tags identifying the build tool that produced a compilation.
 * The numbering is part of the export format and must never change.
 */
export enum PlatformType {
  NOT_IMPLEMENTED = 0,
  SOLC = 1,
  TRUFFLE = 2,
  EMBARK = 3,
  DAPP = 4,
  ETHERLIME = 5,
  ETHERSCAN = 6,
  VYPER = 7,
  WAFFLE = 8,
  BROWNIE = 9,
  SOLC_STANDARD_JSON = 10,
  HARDHAT = 11,
  FOUNDRY = 12,
  STANDARD = 100,
  ARCHIVE = 101
}

/**
 * Detection priority: lower runs first. Tools that wrap others (Foundry, Hardhat)
 * must be probed before the ones they could be mistaken for.
 */
export function platformPriority(type: number): number {
  switch (type) {
    case PlatformType.FOUNDRY:
      return 100
    case PlatformType.HARDHAT:
      return 200
    case PlatformType.TRUFFLE:
    case PlatformType.WAFFLE:
      return 300
    default:
      return 1000
  }
}
