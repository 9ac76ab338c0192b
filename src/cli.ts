import { Command } from 'commander'
import { makeCompileCommand, makeListCommand, makePlatformsCommand } from './commands'

export function setupCommands(program: Command): void {
  // Make compile the default command when no subcommand is provided
  program.addCommand(makeCompileCommand(), {
    isDefault: true,
    hidden: false // Keep it visible in help
  })

  program.addCommand(makeListCommand())
  program.addCommand(makePlatformsCommand())
}
