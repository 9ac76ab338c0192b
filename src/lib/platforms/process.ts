import { execFile } from 'child_process'
import { promisify } from 'util'
import { InvalidCompilation } from '../errors'
import { compilationEvents } from '../events/emitter'

const execFileAsync = promisify(execFile)

export interface ToolResult {
  stdout: string
  stderr: string
}

function outputOf(error: object, key: 'stdout' | 'stderr'): string {
  const value: unknown = Reflect.get(error, key)
  return typeof value === 'string' ? value : ''
}

function emitOutput(command: string, result: ToolResult): void {
  if (result.stdout.trim()) {
    compilationEvents.emitEvent({
      type: 'tool_output',
      level: 'debug',
      data: { command, stream: 'stdout', output: result.stdout.trim() }
    })
  }
  if (result.stderr.trim()) {
    compilationEvents.emitEvent({
      type: 'tool_output',
      level: 'warn',
      data: { command, stream: 'stderr', output: result.stderr.trim() }
    })
  }
}

/**
 * Runs a build tool in `cwd` and captures its output.
 * @throws InvalidCompilation when the tool cannot be spawned or exits non-zero.
 */
export async function runTool(file: string, args: string[], cwd: string): Promise<ToolResult> {
  const command = [file, ...args].join(' ')
  compilationEvents.emitEvent({
    type: 'tool_invocation',
    level: 'info',
    data: { command, cwd }
  })

  try {
    const { stdout, stderr } = await execFileAsync(file, args, {
      cwd,
      maxBuffer: 64 * 1024 * 1024
    })
    const result = { stdout: String(stdout), stderr: String(stderr) }
    emitOutput(command, result)
    return result
  } catch (error) {
    if (typeof error !== 'object' || error === null) {
      throw new InvalidCompilation(`\`${command}\` failed: ${String(error)}`, { cause: error })
    }
    // may be an Error from another realm
    emitOutput(command, { stdout: outputOf(error, 'stdout'), stderr: outputOf(error, 'stderr') })
    const code: unknown = Reflect.get(error, 'code')
    const message: unknown = Reflect.get(error, 'message')
    const reason = code === 'ENOENT'
      ? `\`${file}\` was not found; is it installed?`
      : `\`${command}\` failed: ${typeof message === 'string' ? message : String(error)}`
    throw new InvalidCompilation(reason, { cause: error })
  }
}
