import { Command } from 'commander'
import chalk from 'chalk'
import { loadDeployedContracts, PREDEPLOYED_FLAGS } from '../lib/config'
import { CONTRACT_IDS, contractDisplayName } from '../lib/types/contracts'
import { dotenvOption, loadDotenv, predeployedOptions } from './common'

interface ListOptions {
  dotenv?: string
  [predeployed: string]: unknown
}

export function makeListCommand(): Command {
  const list = new Command('list')
    .description('List the contracts this tool tracks and any predeployed addresses found in options or the environment')

  predeployedOptions(list)
  dotenvOption(list)

  list.action((options: ListOptions) => {
    try {
      loadDotenv(options)
      const deployed = loadDeployedContracts(options)

      console.log(chalk.bold.underline('Known Contracts:'))
      for (const id of CONTRACT_IDS) {
        const address = deployed[id]
        const status = address ? chalk.green(address) : chalk.gray('not deployed')
        console.log(`- ${chalk.cyan(id)}: ${status}`)
        console.log(`  ${chalk.gray('Env:')} ${contractDisplayName(id)}  ${chalk.gray('Flag:')} --${PREDEPLOYED_FLAGS[id].flag}`)
      }
    } catch (error) {
      console.error(chalk.red('Error listing contracts:'), error instanceof Error ? error.message : String(error))
      process.exit(1)
    }
  })

  return list
}
