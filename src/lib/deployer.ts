import { AddressCache } from './contracts/cache'
import { CreationTransaction } from './backend/types'
import { DeployerError, DeploymentError } from './errors'
import { DeploymentEventEmitter, deploymentEvents } from './events'
import { ContractId } from './types/contracts'

/**
 * Options for configuring a Deployer instance.
 */
export interface DeployerOptions {
  /** Optional: Addresses known before the run. Defaults to an empty cache. */
  contracts?: AddressCache

  /** Optional: Custom event emitter instance. If not provided, uses the global singleton. */
  eventEmitter?: DeploymentEventEmitter
}

/**
 * Deploys a contract and resolves to its address. Receives the deployer so it
 * can deploy its own prerequisites first.
 */
export type DeployProcedure = (deployer: Deployer) => Promise<string>

/**
 * Deploys each contract at most once per run, in dependency order.
 *
 * Prerequisites are deployed by calling back into the same Deployer from a
 * procedure; each nested call is awaited before the caller continues, so only
 * one deployment touches the cache at a time. Dependency cycles are not
 * detected.
 */
export class Deployer {
  public readonly contracts: AddressCache
  public readonly events: DeploymentEventEmitter
  // Failures already announced by a nested deployFn
  private readonly reported = new WeakSet<DeployerError>()

  constructor(options: DeployerOptions = {}) {
    this.contracts = options.contracts || new AddressCache()
    this.events = options.eventEmitter || deploymentEvents
  }

  /**
   * Deploy a contract by running `deploy`.
   *
   * `deploy` is only called if `id` is not in the cache yet; otherwise the
   * cached address is returned. Nothing is recorded for `id` when `deploy`
   * fails, but prerequisites it already deployed stay recorded.
   */
  public async deployFn(id: ContractId, deploy: DeployProcedure): Promise<string> {
    const cached = this.contracts.lookup(id)
    if (cached !== undefined) {
      this.events.emitEvent({
        type: 'contract_deployment_skipped',
        level: 'info',
        data: { contract: id, address: cached }
      })
      return cached
    }

    this.events.emitEvent({
      type: 'contract_deployment_started',
      level: 'info',
      data: { contract: id }
    })

    let address: string
    try {
      address = await deploy(this)
      this.contracts.record(id, address)
    } catch (error) {
      if (error instanceof DeployerError && this.reported.has(error)) {
        throw error
      }
      // Errors from a prerequisite already name the contract that failed
      const failure = error instanceof DeployerError ? error : new DeploymentError(id, error)
      this.reported.add(failure)
      this.events.emitEvent({
        type: 'contract_deployment_failed',
        level: 'error',
        data: { contract: id, error: failure.message }
      })
      throw failure
    }

    this.events.emitEvent({
      type: 'contract_deployed',
      level: 'info',
      data: { contract: id, address }
    })
    return address
  }

  /**
   * Deploy a contract by broadcasting its creation transaction.
   *
   * The transaction is only sent if `id` is not already deployed.
   */
  public async deployTx(id: ContractId, tx: CreationTransaction): Promise<string> {
    return this.deployFn(id, () => tx.send())
  }
}
