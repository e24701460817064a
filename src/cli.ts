import { Command } from 'commander'
import { makeDeployCommand, makeListCommand } from './commands'

export function setupCommands(program: Command): void {
  // Make deploy the default command when no subcommand is provided
  program.addCommand(makeDeployCommand(), {
    isDefault: true,
    hidden: false // Keep it visible in help
  })

  program.addCommand(makeListCommand())
}
