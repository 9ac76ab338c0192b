import chalk from 'chalk'
import { CompilationEvent } from '../types/events'
import { CompilationEventEmitter } from './emitter'

/**
 * Verbosity levels for filtering console output:
 * 0 (default): errors, warnings, detected platform and written exports
 * 1 (-v): add tool invocations and import summaries
 * 2 (-vv): add tool output and compilation unit details
 * 3 (-vvv): full debug
 */
export type VerbosityLevel = 0 | 1 | 2 | 3

const level0Events = new Set([
  'platform_detected', 'compile_failed', 'export_written',
  'unknown_platform_warning',
  'unhandled_rejection', 'uncaught_exception', 'cli_error'
])

const level1Events = new Set([
  'compile_started', 'compile_completed',
  'tool_invocation', 'artifact_imported'
])

const level2Events = new Set([
  'tool_output', 'compilation_unit_loaded', 'config_loaded'
])

/**
 * CLI adapter that converts structured compilation events into
 * formatted console output using chalk for colors.
 */
export class CLIEventAdapter {
  private readonly listener = (event: CompilationEvent): void => this.handleEvent(event)

  constructor(
    private readonly emitter: CompilationEventEmitter,
    private verbosity: VerbosityLevel = 0
  ) {
    this.emitter.onAnyEvent(this.listener)
  }

  setVerbosity(verbosity: VerbosityLevel): void {
    this.verbosity = verbosity
  }

  /**
   * Determines the minimum verbosity level required to show an event.
   */
  private getEventVerbosityLevel(event: CompilationEvent): VerbosityLevel {
    // Tool stderr is surfaced at the default level; stdout is noise
    if (event.type === 'tool_output' && event.level === 'warn') return 0
    if (level0Events.has(event.type)) return 0
    if (level1Events.has(event.type)) return 1
    if (level2Events.has(event.type)) return 2
    return 3
  }

  private handleEvent(event: CompilationEvent): void {
    if (this.verbosity < this.getEventVerbosityLevel(event)) {
      return
    }
    switch (event.type) {
      case 'compile_started':
        console.log(chalk.blue(`Compiling ${event.data.target}`))
        break

      case 'platform_detected':
        console.log(chalk.cyan(`${event.data.platform} project detected at ${event.data.target}`))
        break

      case 'platform_probe_failed':
        console.log(chalk.gray(`  - ${event.data.platform} probe failed: ${event.data.error}`))
        break

      case 'compile_completed':
        console.log(chalk.green(`Compiled ${event.data.contractCount} contracts in ${event.data.unitCount} compilation units`))
        break

      case 'compile_failed':
        console.error(chalk.red.bold(`Compilation of ${event.data.target} failed:`))
        console.error(chalk.red(`  ${event.data.error}`))
        break

      case 'tool_invocation':
        console.log(chalk.gray(`  $ ${event.data.command} (in ${event.data.cwd})`))
        break

      case 'tool_output':
        if (event.data.stream === 'stderr') {
          console.warn(chalk.yellow(event.data.output))
        } else {
          console.log(chalk.gray(event.data.output))
        }
        break

      case 'temporary_file_created':
        console.log(chalk.gray(`  Temporary file created: ${event.data.path}`))
        break

      case 'compilation_unit_loaded':
        console.log(chalk.gray(`  Unit ${event.data.key}: ${event.data.contractCount} contracts (${event.data.compiler} ${event.data.version})`))
        break

      case 'export_written':
        console.log(chalk.green(`Wrote ${event.data.path}`))
        break

      case 'artifact_imported':
        console.log(chalk.blue(`Loaded ${event.data.unitCount} compilation units${event.data.legacy ? ' (legacy format)' : ''}`))
        break

      case 'unknown_platform_warning':
        console.warn(chalk.yellow(`Warning: unknown platform type ${event.data.platformType}, falling back to Standard`))
        break

      case 'config_loaded':
        console.log(chalk.gray(`  Config: ${event.data.path}`))
        if (event.data.ignoredKeys.length > 0) {
          console.log(chalk.gray(`  Ignored config keys: ${event.data.ignoredKeys.join(', ')}`))
        }
        break

      case 'unhandled_rejection':
        console.error(chalk.red('Unhandled Rejection:'), event.data.reason)
        break

      case 'uncaught_exception':
        console.error(chalk.red('Uncaught Exception:'), event.data.error)
        break

      case 'cli_error':
        console.error(chalk.red(`Error: ${event.data.message}`))
        break
    }
  }

  /**
   * Detaches this adapter from its emitter.
   */
  public destroy(): void {
    this.emitter.offAnyEvent(this.listener)
  }
}
