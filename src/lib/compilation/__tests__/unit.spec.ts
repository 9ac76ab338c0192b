import { InvalidCompilation } from '../../errors'
import { Filename } from '../../naming/filename'
import { createCompilerVersion, extractSemver } from '../compiler-version'
import { hashedPlaceholder, legacyPlaceholder } from '../libraries'
import { Natspec } from '../natspec'
import { CompilationUnit, ContractArtifact, joinSrcmap, splitSrcmap } from '../unit'
import { JsonValue } from '../../types/json'

const tokenAbi: JsonValue = [
  {
    type: 'function',
    name: 'transfer',
    stateMutability: 'nonpayable',
    inputs: [
      { name: 'to', type: 'address' },
      { name: 'amount', type: 'uint256' }
    ],
    outputs: [{ name: '', type: 'bool' }]
  },
  {
    type: 'event',
    name: 'Transfer',
    anonymous: false,
    inputs: [
      { indexed: true, name: 'from', type: 'address' },
      { indexed: true, name: 'to', type: 'address' },
      { indexed: false, name: 'value', type: 'uint256' }
    ]
  }
]

const mainFile = new Filename('/p/src/Main.sol', 'src/Main.sol', 'src/Main.sol', 'Main.sol')
const mathFile = new Filename('/p/src/SafeMath.sol', 'src/SafeMath.sol', 'src/SafeMath.sol', 'SafeMath.sol')

function artifact(filename: Filename, overrides: Partial<ContractArtifact> = {}): ContractArtifact {
  return {
    filename,
    abi: [],
    bytecodeInit: '6080',
    bytecodeRuntime: '6080',
    srcmapInit: ['0:10:0'],
    srcmapRuntime: ['0:5:0'],
    ...overrides
  }
}

describe('CompilationUnit', () => {
  let unit: CompilationUnit

  beforeEach(() => {
    unit = new CompilationUnit('u1')
  })

  describe('addContract', () => {
    it('should register the bare name in every mapping', () => {
      const name = unit.addContract('src/Main.sol:Main', artifact(mainFile, { abi: tokenAbi }))

      expect(name).toBe('Main')
      expect(Array.from(unit.contractsNames)).toEqual(['Main'])
      expect(unit.filenameOfContract('Main')).toBe(mainFile)
      expect(unit.abis.get('Main')).toEqual(tokenAbi)
      expect(unit.srcmapsInit.get('Main')).toEqual(['0:10:0'])
      expect(unit.libraries.get('Main')).toEqual({})
      expect(unit.natspec.get('Main')?.export()).toEqual({ userdoc: {}, devdoc: {} })
    })

    it('should map absolute paths back to relative ones', () => {
      unit.addContract('Main', artifact(mainFile))
      expect(unit.relativeFilenameFromAbsolute('/p/src/Main.sol')).toBe('src/Main.sol')
      expect(unit.relativeFilenameFromAbsolute('/p/src/Other.sol')).toBeUndefined()
    })
  })

  describe('compiler version', () => {
    it('should refuse reads before it is set', () => {
      expect(unit.hasCompilerVersion()).toBe(false)
      expect(() => unit.compilerVersion).toThrow(InvalidCompilation)
    })

    it('should be set exactly once', () => {
      const version = createCompilerVersion('solc', '0.8.19', true)
      unit.setCompilerVersion(version)

      expect(unit.compilerVersion).toBe(version)
      expect(Object.isFrozen(version)).toBe(true)
      expect(() => unit.setCompilerVersion(createCompilerVersion('solc', '0.8.20', false))).toThrow(
        'Compiler version of compilation unit "u1" is already set'
      )
    })

    it('should extract the semantic version from compiler banners', () => {
      expect(extractSemver('0.8.19+commit.7dd6d404')).toBe('0.8.19')
      expect(extractSemver('Version: 0.6.12+commit.27d51765.Linux.g++')).toBe('0.6.12')
      expect(extractSemver('nightly')).toBeUndefined()
    })
  })

  describe('assertComplete', () => {
    it('should pass for a fully populated unit', () => {
      unit.setCompilerVersion(createCompilerVersion('solc', '0.8.19', null))
      unit.addContract('Main', artifact(mainFile))
      expect(() => unit.assertComplete()).not.toThrow()
    })

    it('should fail without a compiler version', () => {
      unit.addContract('Main', artifact(mainFile))
      expect(() => unit.assertComplete()).toThrow('Compilation unit "u1" has no compiler version')
    })

    it('should name the contract and the missing mapping', () => {
      unit.setCompilerVersion(createCompilerVersion('solc', '0.8.19', null))
      unit.addContract('Main', artifact(mainFile))
      unit.abis.delete('Main')
      expect(() => unit.assertComplete()).toThrow('Contract "Main" in compilation unit "u1" has no abi')
    })
  })

  describe('libraries', () => {
    it('should return stored libraries as they are', () => {
      const placeholder = hashedPlaceholder('src/SafeMath.sol:SafeMath')
      unit.addContract('Main', artifact(mainFile, { libraries: { [placeholder]: 'SafeMath' } }))
      expect(unit.librariesNamesAndPatterns('Main')).toEqual({ [placeholder]: 'SafeMath' })
    })

    it('should detect legacy placeholders of contracts in the unit', () => {
      const placeholder = legacyPlaceholder('SafeMath')
      unit.addContract('Main', artifact(mainFile, { bytecodeInit: `6080${placeholder}00` }))
      unit.addContract('SafeMath', artifact(mathFile))

      expect(unit.librariesNamesAndPatterns('Main')).toEqual({ [placeholder]: 'SafeMath' })
      expect(unit.librariesNamesAndPatterns('SafeMath')).toEqual({})
    })

    it('should detect hashed placeholders through any filename view', () => {
      const placeholder = hashedPlaceholder('src/SafeMath.sol:SafeMath')
      unit.addContract('Main', artifact(mainFile, { bytecodeRuntime: `6080${placeholder}` }))
      unit.addContract('SafeMath', artifact(mathFile))

      expect(unit.librariesNamesAndPatterns('Main')).toEqual({ [placeholder]: 'SafeMath' })
    })

    it('should link libraries into both bytecodes on request', () => {
      const placeholder = legacyPlaceholder('SafeMath')
      unit.addContract('Main', artifact(mainFile, {
        bytecodeInit: `6080${placeholder}00`,
        bytecodeRuntime: `60${placeholder}`
      }))
      unit.addContract('SafeMath', artifact(mathFile))
      const links = { SafeMath: '0x2222222222222222222222222222222222222222' }

      expect(unit.bytecodeInit('Main')).toBe(`6080${placeholder}00`)
      expect(unit.bytecodeInit('Main', links)).toBe(`6080${'22'.repeat(20)}00`)
      expect(unit.bytecodeRuntime('Main', links)).toBe(`60${'22'.repeat(20)}`)
    })
  })

  describe('ABI helpers', () => {
    it('should compute function selectors', () => {
      unit.addContract('Token', artifact(mainFile, { abi: tokenAbi }))
      expect(unit.hashes('Token')).toEqual({ 'transfer(address,uint256)': 2835717307 })
    })

    it('should compute event topics', () => {
      unit.addContract('Token', artifact(mainFile, { abi: tokenAbi }))
      expect(unit.eventsTopics('Token')).toEqual({
        'Transfer(address,address,uint256)': '0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef'
      })
    })

    it('should reject unknown contracts', () => {
      expect(() => unit.hashes('Missing')).toThrow('Unknown contract "Missing" in compilation unit "u1"')
    })
  })

  describe('source maps', () => {
    it('should split and join on semicolons', () => {
      expect(splitSrcmap('1:2:0;;3:4:1')).toEqual(['1:2:0', '', '3:4:1'])
      expect(splitSrcmap('')).toEqual([''])
      expect(joinSrcmap(['1:2:0', '', '3:4:1'])).toBe('1:2:0;;3:4:1')
    })
  })

  describe('Natspec', () => {
    it('should default missing buckets to empty objects', () => {
      const natspec = Natspec.from({ notice: 'Moves tokens' }, 'not-an-object')
      expect(natspec.export()).toEqual({ userdoc: { notice: 'Moves tokens' }, devdoc: {} })
    })
  })
})
