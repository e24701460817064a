import chalk from 'chalk'
import { DeploymentEvent } from './types'
import { DeploymentEventEmitter } from './emitter'

/**
 * Verbosity levels for filtering console output:
 * 0 (default): errors, skipped and deployed contracts, run start and end
 * 1 (-v): add transaction details and written outputs
 * 2 (-vv): add library linking
 * 3 (-vvv): everything
 */
export type VerbosityLevel = 0 | 1 | 2 | 3

export function toVerbosityLevel(value: number): VerbosityLevel {
  if (value <= 0) return 0
  if (value === 1) return 1
  if (value === 2) return 2
  return 3
}

/**
 * CLI adapter that converts structured deployment events into
 * formatted console output using chalk for colors.
 */
export class CLIEventAdapter {
  private emitter: DeploymentEventEmitter
  private verbosity: VerbosityLevel
  private logToStderr = false
  private readonly listener = (event: DeploymentEvent): void => this.handleEvent(event)

  constructor(emitter: DeploymentEventEmitter, verbosity: VerbosityLevel = 0) {
    this.emitter = emitter
    this.verbosity = verbosity
    this.emitter.onAnyEvent(this.listener)
  }

  setVerbosity(verbosity: VerbosityLevel): void {
    this.verbosity = verbosity
  }

  /**
   * Moves progress output off stdout, for when stdout carries the exported
   * addresses.
   */
  setLogToStderr(enabled: boolean): void {
    this.logToStderr = enabled
  }

  private log(...args: unknown[]): void {
    if (this.logToStderr) {
      console.error(...args)
    } else {
      console.log(...args)
    }
  }

  /**
   * Determines the minimum verbosity level required to show an event.
   */
  private getEventVerbosityLevel(eventType: DeploymentEvent['type']): VerbosityLevel {
    switch (eventType) {
      case 'deployment_started':
      case 'deployment_completed':
      case 'deployment_failed':
      case 'contract_deployment_skipped':
      case 'contract_deployed':
      case 'contract_deployment_failed':
      case 'unhandled_rejection':
      case 'uncaught_exception':
      case 'cli_error':
        return 0
      case 'network_signer_info':
      case 'contract_deployment_started':
      case 'transaction_sent':
      case 'transaction_confirmed':
      case 'addresses_written':
        return 1
      case 'library_linked':
        return 2
    }
  }

  private handleEvent(event: DeploymentEvent): void {
    if (this.verbosity < this.getEventVerbosityLevel(event.type)) {
      return
    }
    switch (event.type) {
      case 'deployment_started':
        this.log(chalk.bold.inverse(` DEPLOYING ${event.data.variant.toUpperCase()} LIGHT CLIENT `))
        this.log(chalk.gray(`   - RPC: ${event.data.rpcUrl}`))
        if (event.data.predeployed.length > 0) {
          this.log(chalk.gray(`   - Predeployed: ${event.data.predeployed.join(', ')}`))
        }
        break

      case 'network_signer_info':
        this.log(chalk.gray(`   - Sender: ${event.data.address} (ChainID: ${event.data.chainId})`))
        break

      case 'contract_deployment_skipped':
        this.log(chalk.yellow(`  ↪ Skipping deployment of ${event.data.contract}, already deployed at ${event.data.address}`))
        break

      case 'contract_deployment_started':
        this.log(chalk.blue(`  - Deploying ${event.data.contract}`))
        break

      case 'contract_deployed':
        this.log(chalk.green(`  ✅ Deployed ${event.data.contract} at ${event.data.address}`))
        break

      case 'contract_deployment_failed':
        console.error(chalk.red(`  ❌ ${event.data.contract} failed: ${event.data.error}`))
        break

      case 'library_linked':
        this.log(chalk.magenta(`      Linked ${event.data.library} into ${event.data.contractName} at ${event.data.address}`))
        break

      case 'transaction_sent':
        this.log(chalk.gray(`        to: ${event.data.to}, data: ${event.data.dataPreview}...`))
        this.log(chalk.gray(`        tx hash: ${event.data.txHash}`))
        break

      case 'transaction_confirmed':
        this.log(chalk.gray(`        tx confirmed in block: ${event.data.blockNumber}`))
        break

      case 'addresses_written':
        this.log(chalk.green(`   - Wrote ${event.data.count} addresses to ${event.data.destination}`))
        break

      case 'deployment_completed':
        this.log(chalk.bold.inverse(`\n LIGHT CLIENT READY AT ${event.data.address} `))
        break

      case 'deployment_failed':
        console.error(chalk.red.bold('\n💥 DEPLOYMENT FAILED!'))
        if (event.data.contract) {
          console.error(chalk.red(`   ✗ Failed contract: ${event.data.contract}`))
        }
        console.error(chalk.red(event.data.stack ?? event.data.error))
        break

      case 'unhandled_rejection':
        console.error(chalk.red('Unhandled Rejection:'), event.data.reason)
        break

      case 'uncaught_exception':
        console.error(chalk.red('Uncaught Exception:'), event.data.error)
        break

      case 'cli_error':
        console.error(chalk.red('Error:'), event.data.message)
        break
    }
  }

  /**
   * Stop listening to events (cleanup method).
   */
  public destroy(): void {
    this.emitter.off('event', this.listener)
  }
}
