import { Command } from 'commander'
import chalk from 'chalk'
import { CompilationSession } from '../lib/compilation/session'
import { failCommand, setVerbosity, verbosityOption } from './common'

interface ListOptions {
  verbose: number
}

function describeOptimizer(optimized: boolean | null): string {
  if (optimized === null) return 'optimizer unknown'
  return optimized ? 'optimized' : 'not optimized'
}

export function makeListCommand(): Command {
  const list = new Command('list')
    .description('List the compilation units and contracts of an export file')
    .argument('<artifact>', 'Export file written by `compile`')
  verbosityOption(list)

  list.action(async (artifact: string, options: ListOptions) => {
    try {
      setVerbosity(options.verbose)
      const session = await CompilationSession.fromExportFile(artifact)
      const platform = session.platform

      console.log(chalk.bold.underline('Export:'), artifact)
      console.log(`  Platform: ${chalk.cyan(platform.platformNameUsed())} ${chalk.gray(platform.platformProjectUrlUsed())}`)
      console.log(`  Working directory: ${session.workingDir}`)
      if (session.packageName) {
        console.log(`  Package: ${session.packageName}`)
      }

      for (const [key, unit] of session.compilationUnits) {
        const { compiler, version, optimized } = unit.compilerVersion
        console.log(chalk.bold(`\nCompilation unit ${key}`))
        console.log(`  ${compiler} ${version} (${describeOptimizer(optimized)})`)
        const names = Array.from(unit.contractsNames).sort()
        if (names.length === 0) {
          console.log(chalk.yellow('  No contracts.'))
          continue
        }
        for (const name of names) {
          const filename = unit.filenameOfContract(name)
          const dependencyMark = session.isDependency(filename.absolute) ? ` ${chalk.yellow('(dependency)')}` : ''
          console.log(`  - ${chalk.cyan(name)} ${chalk.gray(filename.short)}${dependencyMark}`)
        }
      }

      const tests = await platform.guessedTests()
      if (tests.length > 0) {
        console.log(chalk.bold('\nUnit tests:'))
        for (const test of tests) {
          console.log(`  ${test}`)
        }
      }
    } catch (error) {
      failCommand(error)
    }
  })

  return list
}
