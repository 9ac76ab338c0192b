import { Command } from 'commander'
import * as path from 'path'
import { loadCompileConfig, optionsFromEnv, resolveCompileOptions } from '../lib/config/loader'
import { CompilationSession } from '../lib/compilation/session'
import { exportToStandard } from '../lib/export/standard'
import { CompileOptions, DEFAULT_EXPORT_DIR } from '../lib/types/options'
import { isDirectory } from '../lib/utils/files'
import { configOption, dotenvOption, failCommand, loadDotenv, setVerbosity, verbosityOption } from './common'

interface CompileCommandOptions extends CompileOptions {
  config?: string
  dotenv?: string
  verbose: number
}

/**
 * Collects the compile flags commander parsed, dropping the command's own ones.
 */
function cliCompileOptions(options: CompileCommandOptions): CompileOptions {
  const { config: _config, dotenv: _dotenv, verbose: _verbose, ...compileOptions } = options
  return compileOptions
}

export function makeCompileCommand(): Command {
  const compile = new Command('compile')
    .description('Compile a project (or load an export) and write the canonical export file')
    .argument('[target]', 'Project directory or export file', '.')
    .option('--export-dir <dir>', `Directory the export is written to (default: ${DEFAULT_EXPORT_DIR})`)
    .option('--ignore-compile', 'Do not run any build tool; read existing build output')
    .option('--npx-disable', 'Run node-based build tools without npx')
    .option('--dapp-ignore', 'Never detect a Dapp project')
    .option('--dapp-ignore-compile', 'Do not run `dapp build`')
    .option('--waffle-ignore', 'Never detect a Waffle project')
    .option('--waffle-ignore-compile', 'Do not run `waffle`')
    .option('--waffle-config-file <path>', 'Waffle config file (default: waffle.json)')
    .option('--hardhat-ignore', 'Never detect a Hardhat project')
    .option('--hardhat-ignore-compile', 'Do not run `hardhat compile`')
    .option('--hardhat-artifacts-directory <dir>', 'Hardhat artifacts directory (default: artifacts)')
    .option('--foundry-ignore', 'Never detect a Foundry project')
    .option('--foundry-ignore-compile', 'Do not run `forge build`')
    .option('--foundry-out-directory <dir>', 'Foundry output directory (default: out)')
    .option('--standard-ignore', 'Never detect an export file')

  configOption(compile)
  dotenvOption(compile)
  verbosityOption(compile)

  compile.action(async (target: string, options: CompileCommandOptions) => {
    try {
      setVerbosity(options.verbose)
      loadDotenv(options)

      const projectRoot = (await isDirectory(target)) ? target : path.dirname(target)
      const fileOptions = await loadCompileConfig(projectRoot, options.config)
      const compileOptions = resolveCompileOptions(cliCompileOptions(options), fileOptions, optionsFromEnv())

      const session = await CompilationSession.create(target, compileOptions)
      await exportToStandard(session, compileOptions.exportDir)
    } catch (error) {
      failCommand(error)
    }
  })

  return compile
}
