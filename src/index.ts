#!/usr/bin/env node

import { program } from 'commander'
import { setupCommands } from './cli'
import packageJson from '../package.json'

import { deploymentEvents } from './lib/events'

// Setup global error handling
process.on('unhandledRejection', (reason) => {
  deploymentEvents.emitEvent({
    type: 'unhandled_rejection',
    level: 'error',
    data: {
      reason
    }
  })
  process.exit(1)
})

process.on('uncaughtException', (error) => {
  deploymentEvents.emitEvent({
    type: 'uncaught_exception',
    level: 'error',
    data: {
      error
    }
  })
  process.exit(1)
})

async function main() {
  try {
    // Configure the main program
    program
      .name('lc-deploy')
      .description('Deploys the light client contract and its linked libraries')
      .version(packageJson.version)

    // Setup all commands
    setupCommands(program)

    // Parse arguments
    await program.parseAsync(process.argv)
  } catch (error) {
    deploymentEvents.emitEvent({
      type: 'cli_error',
      level: 'error',
      data: {
        message: error instanceof Error ? error.message : String(error)
      }
    })
    process.exit(1)
  }
}

void main()
