import { Command, InvalidArgumentError } from 'commander'
import * as dotenv from 'dotenv'
import * as path from 'path'
import { CLIEventAdapter, deploymentEvents, VerbosityLevel } from '../lib/events'
import { PREDEPLOYED_FLAGS } from '../lib/config'
import { CONTRACT_IDS, contractDisplayName } from '../lib/types/contracts'

// Converts events to console output for every command
const cliAdapter = new CLIEventAdapter(deploymentEvents)

export function setVerbosity(level: VerbosityLevel): void {
  cliAdapter.setVerbosity(level)
}

/**
 * Sends progress output to stderr, keeping stdout for command output.
 */
export function setLogToStderr(enabled: boolean): void {
  cliAdapter.setLogToStderr(enabled)
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
 * Adds one --<contract> <address> option per known contract.
 */
export const predeployedOptions = (cmd: Command): Command => {
  for (const id of CONTRACT_IDS) {
    const { flag, description } = PREDEPLOYED_FLAGS[id]
    cmd.option(`--${flag} <address>`, `${description}. Can also be set via ${contractDisplayName(id)} env var.`)
  }
  return cmd
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

/**
 * Loads environment variables from the specified .env file path.
 */
export function loadDotenv(options: { dotenv?: string }): void {
  const dotenvPath = options.dotenv ? path.resolve(options.dotenv) : path.resolve(process.cwd(), '.env')
  dotenv.config({ path: dotenvPath })
}
