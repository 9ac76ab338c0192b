import * as fs from 'fs/promises'
import * as path from 'path'
import { CompilationSession } from '../../compilation/session'
import { MalformedArtifactError } from '../../errors'
import { compilationEvents } from '../../events/emitter'
import { createProject, readFixture, removeProject } from '../../platforms/__tests__/helpers'
import { CompilationEvent } from '../../types/events'
import { exportTargetName, exportToStandard, generateStandardExport, loadFromCompile } from '../standard'

function contractEntry(file: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    abi: [],
    bin: '6080',
    'bin-runtime': '6081',
    srcmap: '0:1:0;;',
    'srcmap-runtime': '0:1:0',
    filenames: { absolute: `/p/${file}`, used: file, short: path.basename(file), relative: file },
    libraries: {},
    is_dependency: false,
    userdoc: {},
    devdoc: {},
    ...overrides
  }
}

function unitEntry(contracts: Record<string, unknown>): Record<string, unknown> {
  return {
    compiler: { compiler: 'solc', version: '0.8.19', optimized: true },
    asts: { '/p/src/A.sol': { nodeType: 'SourceUnit', id: 1 } },
    contracts
  }
}

function exportDocument(units: Record<string, unknown>, type: number = 12): Record<string, unknown> {
  return {
    compilation_units: units,
    package: null,
    working_dir: '/p',
    type,
    unit_tests: ['forge test']
  }
}

describe('Standard export', () => {
  let events: CompilationEvent[]
  const listener = (event: CompilationEvent): void => {
    events.push(event)
  }

  beforeEach(() => {
    events = []
    compilationEvents.onAnyEvent(listener)
  })

  afterEach(() => {
    compilationEvents.offAnyEvent(listener)
  })

  describe('round trip', () => {
    let root: string

    beforeEach(async () => {
      root = await createProject({
        Makefile: 'all:\n\tdapp build\ntest:\n\tdapp test\n',
        'src/Token.sol': 'contract Token {}',
        'lib/ds-math/src/math.sol': 'contract DSMath {}',
        'out/dapp.sol.json': await readFixture('dapp.sol.json')
      })
    })

    afterEach(async () => {
      await removeProject(root)
    })

    it('should describe every contract of a compiled project', async () => {
      const session = await CompilationSession.create(root, { ignoreCompile: true })
      const document = await generateStandardExport(session)

      expect(Object.keys(document.compilation_units)).toEqual([root])
      expect(document.type).toBe(4)
      expect(document.package).toBeNull()
      expect(document.unit_tests).toEqual(['make test', 'dapp test'])

      const unit = document.compilation_units[root]
      expect(unit.compiler).toEqual({ compiler: 'solc', version: '0.6.12', optimized: true })
      expect(unit.contracts.Token.srcmap).toBe('25:100:0:-;;;')
      expect(unit.contracts.Token.filenames).toEqual({
        absolute: path.join(root, 'src/Token.sol'),
        used: 'src/Token.sol',
        short: 'Token.sol',
        relative: 'src/Token.sol'
      })
      expect(unit.contracts.Token.is_dependency).toBe(false)
      expect(unit.contracts.Token.userdoc).toEqual({ notice: 'Moves tokens' })
      expect(unit.contracts.DSMath.is_dependency).toBe(true)
    })

    it('should reproduce the same document after an import', async () => {
      const session = await CompilationSession.create(root, { ignoreCompile: true })
      const document = await generateStandardExport(session)

      const imported = CompilationSession.fromExport(JSON.parse(JSON.stringify(document)))

      expect(imported.platform.platformNameUsed()).toBe('Dapp')
      expect(imported.platform.platformTypeUsed()).toBe(4)
      expect(await imported.platform.guessedTests()).toEqual(['make test', 'dapp test'])
      expect(await generateStandardExport(imported)).toEqual(document)
    })

    it('should write the export file and load it back', async () => {
      const session = await CompilationSession.create(root, { ignoreCompile: true })
      const exportDir = path.join(root, 'crytic-export')
      const written = await exportToStandard(session, exportDir)

      expect(written).toEqual([path.join(exportDir, 'contracts.json')])
      expect(events).toContainEqual(
        expect.objectContaining({ type: 'export_written', data: { path: written[0], unitCount: 1 } })
      )

      const loaded = await CompilationSession.fromExportFile(written[0])
      expect(Array.from(loaded.contractsNames()).sort()).toEqual(['DSMath', 'Token'])
      expect(loaded.platform.name).toBe('Standard')
      expect(loaded.platform.platformNameUsed()).toBe('Dapp')
    })
  })

  describe('exportTargetName', () => {
    it('should use the last path segment of file targets', async () => {
      expect(await exportTargetName('/does/not/exist/build_export.json')).toBe('build_export.json')
    })
  })

  describe('loadFromCompile', () => {
    it('should propagate dependency flags to all four views', () => {
      const session = new CompilationSession('export.json')
      loadFromCompile(session, exportDocument({
        u1: unitEntry({
          Test: contractEntry('lib/forge-std/src/Test.sol', { is_dependency: true }),
          A: contractEntry('src/A.sol')
        })
      }))

      expect(Array.from(session.dependencies).sort()).toEqual([
        '/p/lib/forge-std/src/Test.sol',
        'Test.sol',
        'lib/forge-std/src/Test.sol'
      ])
      expect(session.isDependency('/p/src/A.sol')).toBe(false)
    })

    it('should mark four distinct views of a dependency', () => {
      const session = new CompilationSession('export.json')
      loadFromCompile(session, exportDocument({
        u1: unitEntry({
          Test: contractEntry('lib/forge-std/src/Test.sol', {
            is_dependency: true,
            filenames: {
              absolute: '/p/lib/forge-std/src/Test.sol',
              used: 'forge-std/Test.sol',
              short: 'Test.sol',
              relative: 'lib/forge-std/src/Test.sol'
            }
          })
        })
      }))

      expect(Array.from(session.dependencies).sort()).toEqual([
        '/p/lib/forge-std/src/Test.sol',
        'Test.sol',
        'forge-std/Test.sol',
        'lib/forge-std/src/Test.sol'
      ])
      expect(session.isDependency('forge-std/Test.sol')).toBe(true)
    })

    it('should mark the recorded views of a dependency seen earlier under other names', () => {
      const session = new CompilationSession('export.json')
      const shared = { absolute: '/p/lib/Dep.sol', relative: 'lib/Dep.sol' }
      loadFromCompile(session, exportDocument({
        u1: unitEntry({ A: contractEntry('lib/Dep.sol', { filenames: { ...shared, used: 'Dep.sol', short: 'Dep.sol' } }) }),
        u2: unitEntry({
          X: contractEntry('lib/Dep.sol', { is_dependency: true, filenames: { ...shared, used: 'dep/Dep.sol', short: 'x/Dep.sol' } })
        })
      }))

      expect(Array.from(session.dependencies).sort()).toEqual([
        '/p/lib/Dep.sol',
        'Dep.sol',
        'dep/Dep.sol',
        'lib/Dep.sol',
        'x/Dep.sol'
      ])
      expect(session.isDependency('dep/Dep.sol')).toBe(true)
    })

    it('should reject a contract without an absolute path', () => {
      const session = new CompilationSession('export.json')
      expect(() => loadFromCompile(session, exportDocument({
        u1: unitEntry({ A: contractEntry('src/A.sol', { filenames: { used: 'src/A.sol', short: 'A.sol', relative: 'src/A.sol' } }) })
      }))).toThrow(
        'Malformed artifact: compilation_units.u1.contracts.A.filenames.absolute is missing (unit "u1", contract "A")'
      )
      expect(session.compilationUnits.size).toBe(0)
    })

    it('should rebuild filenames from the imported contracts', () => {
      const session = new CompilationSession('export.json')
      loadFromCompile(session, exportDocument({
        u1: unitEntry({ A: contractEntry('src/A.sol') }),
        u2: unitEntry({ A: contractEntry('src/A.sol'), B: contractEntry('src/B.sol') })
      }))

      expect(session.filenames.size).toBe(2)
      expect(session.filenameLookup('src/B.sol')?.absolute).toBe('/p/src/B.sol')
      expect(session.compilationUnits.get('u1')!.filenameOfContract('A')).toBe(
        session.compilationUnits.get('u2')!.filenameOfContract('A')
      )
      expect(session.isInMultipleCompilationUnits('A')).toBe(true)
      expect(session.isInMultipleCompilationUnits('B')).toBe(false)
    })

    it('should load the legacy single-unit layout', () => {
      const session = new CompilationSession('export.json')
      const result = loadFromCompile(session, {
        ...unitEntry({ A: contractEntry('src/A.sol', { userdoc: undefined, devdoc: undefined }) }),
        working_dir: '/legacy',
        type: 4
      })

      expect(result).toEqual({ platformType: 4, unitTests: [] })
      expect(Array.from(session.compilationUnits.keys())).toEqual(['legacy'])
      expect(session.workingDir).toBe('/legacy')
      expect(session.packageName).toBeNull()
      expect(session.compilationUnits.get('legacy')!.natspec.get('A')?.export()).toEqual({ userdoc: {}, devdoc: {} })
      expect(events).toContainEqual(
        expect.objectContaining({ type: 'artifact_imported', data: { unitCount: 1, platformType: 4, legacy: true } })
      )
    })

    it('should default a missing optimizer flag to unknown', () => {
      const session = new CompilationSession('export.json')
      const unit = unitEntry({ A: contractEntry('src/A.sol') })
      loadFromCompile(session, exportDocument({ u1: { ...unit, compiler: { compiler: 'solc', version: '0.8.19' } } }))

      expect(session.compilationUnits.get('u1')!.compilerVersion.optimized).toBeNull()
    })

    it('should reject a missing key without touching the session', () => {
      const session = new CompilationSession('export.json')
      const document = exportDocument({
        u0: unitEntry({ A: contractEntry('src/A.sol') }),
        u1: unitEntry({ Token: contractEntry('src/Token.sol', { bin: undefined }) })
      })

      let caught: unknown
      try {
        loadFromCompile(session, document)
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(MalformedArtifactError)
      const error = caught as MalformedArtifactError
      expect(error.message).toBe(
        'Malformed artifact: compilation_units.u1.contracts.Token.bin is missing (unit "u1", contract "Token")'
      )
      expect(error.unitKey).toBe('u1')
      expect(error.contractName).toBe('Token')
      expect(session.compilationUnits.size).toBe(0)
      expect(session.filenames.size).toBe(0)
    })

    it('should reject values of the wrong type', () => {
      const session = new CompilationSession('export.json')
      expect(() => loadFromCompile(session, exportDocument({
        u1: unitEntry({ A: contractEntry('src/A.sol', { is_dependency: 'yes' }) })
      }))).toThrow('Malformed artifact: compilation_units.u1.contracts.A.is_dependency must be a boolean')
      expect(() => loadFromCompile(session, { ...exportDocument({}), type: '12' })).toThrow(
        'Malformed artifact: type must be an integer'
      )
      expect(() => loadFromCompile(session, { ...exportDocument({}), working_dir: undefined })).toThrow(
        'Malformed artifact: working_dir is missing'
      )
    })
  })

  describe('fromExport', () => {
    it('should report an unknown platform type as Standard', () => {
      const session = CompilationSession.fromExport(exportDocument({ u1: unitEntry({ A: contractEntry('src/A.sol') }) }, 77))

      expect(session.platform.platformNameUsed()).toBe('Standard')
      expect(session.platform.platformTypeUsed()).toBe(77)
      expect(events).toContainEqual(
        expect.objectContaining({ type: 'unknown_platform_warning', data: { platformType: 77 } })
      )
    })

    it('should export contracts named like object builtins', async () => {
      const session = CompilationSession.fromExport(exportDocument({
        u1: unitEntry({ ['__proto__']: contractEntry('src/A.sol') })
      }))
      expect(Array.from(session.contractsNames())).toEqual(['__proto__'])

      const document = await generateStandardExport(session)
      expect(Object.keys(document.compilation_units.u1.contracts)).toEqual(['__proto__'])
      expect(JSON.parse(JSON.stringify(document)).compilation_units.u1.contracts.__proto__.bin).toBe('6080')
    })

    it('should keep the recorded unit tests', async () => {
      const session = CompilationSession.fromExport(exportDocument({ u1: unitEntry({ A: contractEntry('src/A.sol') }) }))

      expect(session.platform.platformNameUsed()).toBe('Foundry')
      expect(await session.platform.guessedTests()).toEqual(['forge test'])
      expect(session.platform.isDependency('/p/lib/x.sol')).toBe(false)
    })
  })

  describe('fromExportFile', () => {
    let root: string

    afterEach(async () => {
      await removeProject(root)
    })

    it('should reject files that are not JSON', async () => {
      root = await createProject({ 'broken_export.json': '{"compilation_units": ' })
      await expect(CompilationSession.fromExportFile(path.join(root, 'broken_export.json'))).rejects.toThrow(
        MalformedArtifactError
      )
    })

    it('should be detected from the export file name', async () => {
      root = await createProject({})
      const filePath = path.join(root, 'build_export.json')
      await fs.writeFile(filePath, JSON.stringify(exportDocument({ u1: unitEntry({ A: contractEntry('src/A.sol') }) })))

      const session = await CompilationSession.create(filePath)
      expect(session.platform.name).toBe('Standard')
      expect(session.compilationUnits.size).toBe(1)
    })
  })
})
