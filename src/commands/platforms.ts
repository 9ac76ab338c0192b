import { Command } from 'commander'
import chalk from 'chalk'
import { defaultRegistry } from '../lib/platforms/registry'

export function makePlatformsCommand(): Command {
  return new Command('platforms')
    .description('List the supported build platforms in detection order')
    .action(() => {
      console.log(chalk.bold.underline('Supported platforms:'))
      for (const definition of defaultRegistry.getPlatforms()) {
        if (definition.hidden) {
          continue
        }
        console.log(`- ${chalk.cyan(definition.name)} (type ${definition.type}) ${chalk.gray(definition.projectUrl)}`)
      }
    })
}
