import { InvalidCompilation } from '../../errors'
import { buildInfoOptimized, isBuildInfoFile, parseBuildInfo } from '../buildinfo'

describe('Build-Info Parsing', () => {
  const contract = {
    abi: [],
    metadata: '{}',
    evm: {
      bytecode: { object: '6080', sourceMap: '1:2:0' },
      deployedBytecode: { object: '6081', sourceMap: '1:2:0' }
    }
  }

  const buildInfo = (overrides: Record<string, unknown> = {}): string =>
    JSON.stringify({
      _format: 'hh-sol-build-info-1',
      id: 'abc123',
      solcVersion: '0.8.19',
      solcLongVersion: '0.8.19+commit.7dd6d404',
      input: { settings: { optimizer: { enabled: true } } },
      output: {
        contracts: { 'contracts/Counter.sol': { Counter: contract } },
        sources: { 'contracts/Counter.sol': { id: 0, ast: { nodeType: 'SourceUnit' } } }
      },
      ...overrides
    })

  describe('isBuildInfoFile function', () => {
    it('should identify build-info files correctly', () => {
      expect(isBuildInfoFile('artifacts/build-info/abc123.json')).toBe(true)
      expect(isBuildInfoFile('/path/to/out/build-info/def456.json')).toBe(true)

      expect(isBuildInfoFile('artifacts/Contract.json')).toBe(false)
      expect(isBuildInfoFile('build-info.json')).toBe(false)
    })
  })

  describe('parseBuildInfo function', () => {
    it('should parse contracts and sources', () => {
      const result = parseBuildInfo(buildInfo(), '/test/abc123.json')

      expect(result).not.toBeNull()
      expect(result!.id).toBe('abc123')
      expect(result!.solcLongVersion).toBe('0.8.19+commit.7dd6d404')
      expect(Object.keys(result!.output.contracts)).toEqual(['contracts/Counter.sol'])
      expect(result!.output.contracts['contracts/Counter.sol'].Counter.evm.bytecode.object).toBe('6080')
      expect(result!.output.sources['contracts/Counter.sol']).toEqual({ id: 0, ast: { nodeType: 'SourceUnit' } })
    })

    it('should accept the forge build-info format', () => {
      expect(parseBuildInfo(buildInfo({ _format: 'ethers-rs-sol-build-info-1' }), '/test/a.json')?._format).toBe(
        'ethers-rs-sol-build-info-1'
      )
    })

    it('should return null for invalid JSON', () => {
      expect(parseBuildInfo('{"_format": ', '/test/broken.json')).toBeNull()
    })

    it('should return null for JSON with wrong format', () => {
      expect(parseBuildInfo(buildInfo({ _format: 'hh-sol-artifact-1' }), '/test/a.json')).toBeNull()
      expect(parseBuildInfo(JSON.stringify({ contractName: 'Counter' }), '/test/a.json')).toBeNull()
    })

    it('should reject contracts without bytecode', () => {
      const broken = buildInfo({
        output: { contracts: { 'contracts/Counter.sol': { Counter: { abi: [] } } }, sources: {} }
      })
      expect(() => parseBuildInfo(broken, '/test/a.json')).toThrow(InvalidCompilation)
      expect(() => parseBuildInfo(broken, '/test/a.json')).toThrow(
        '/test/a.json (contracts/Counter.sol): contract "Counter" lacks its abi or bytecode'
      )
    })
  })

  describe('buildInfoOptimized', () => {
    it('should read the optimizer flag from the input settings', () => {
      expect(buildInfoOptimized(parseBuildInfo(buildInfo(), '/t.json')!)).toBe(true)
      expect(buildInfoOptimized(parseBuildInfo(buildInfo({ input: {} }), '/t.json')!)).toBeNull()
    })
  })
})
