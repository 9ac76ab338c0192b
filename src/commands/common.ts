import { Command } from 'commander'
import * as dotenv from 'dotenv'
import * as path from 'path'
import { CLIEventAdapter, VerbosityLevel, compilationEvents } from '../lib/events'
import { errorMessage } from '../lib/errors'

// Renders library events on the console for every command
export const cliAdapter = new CLIEventAdapter(compilationEvents)

export function toVerbosity(count: number | undefined): VerbosityLevel {
  if (!count || count <= 0) return 0
  if (count === 1) return 1
  if (count === 2) return 2
  return 3
}

export function setVerbosity(count: number | undefined): void {
  cliAdapter.setVerbosity(toVerbosity(count))
}

/**
 * Adds the --dotenv option to a command.
 */
export const dotenvOption = (cmd: Command): Command =>
  cmd.option('--dotenv <path>', 'Path to a custom .env file')

/**
 * Adds verbosity options to a command.
 */
export const verbosityOption = (cmd: Command): Command =>
  cmd.option('-v, --verbose', 'Enable verbose logging (use -vv or -vvv for more detail)', (_, previous: number) => previous + 1, 0)

/**
 * Adds the --config option to a command.
 */
export const configOption = (cmd: Command): Command =>
  cmd.option('--config <path>', 'Path to a configuration file (solcanon.config.{json|yml|yaml})')

/**
 * Loads environment variables from the specified .env file path.
 */
export function loadDotenv(options: { dotenv?: string }): void {
  const dotenvPath = options.dotenv ? path.resolve(options.dotenv) : path.resolve(process.cwd(), '.env')
  dotenv.config({ path: dotenvPath })
}

/**
 * Reports a failed command and exits with status 1.
 */
export function failCommand(error: unknown): never {
  compilationEvents.emitEvent({
    type: 'cli_error',
    level: 'error',
    data: { message: errorMessage(error) }
  })
  process.exit(1)
}
