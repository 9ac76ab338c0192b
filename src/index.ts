#!/usr/bin/env node

import { program } from 'commander'
import { setupCommands } from './cli'
import { failCommand } from './commands/common'
import { compilationEvents } from './lib/events'
import packageJson from '../package.json'

// Setup global error handling
process.on('unhandledRejection', (reason) => {
  compilationEvents.emitEvent({
    type: 'unhandled_rejection',
    level: 'error',
    data: {
      reason
    }
  })
  process.exit(1)
})

process.on('uncaughtException', (error) => {
  compilationEvents.emitEvent({
    type: 'uncaught_exception',
    level: 'error',
    data: {
      error
    }
  })
  process.exit(1)
})

async function main(): Promise<void> {
  // Configure the main program
  program
    .name('solcanon')
    .description('Normalize smart-contract build output into one canonical export')
    .version(packageJson.version)

  // Setup all commands
  setupCommands(program)

  // Parse arguments
  await program.parseAsync(process.argv)
}

main().catch(failCommand)
