import { AddressCache, TextSink } from './contracts/cache'
import { DeploymentBackend } from './backend/types'
import { Deployer } from './deployer'
import { DeploymentError } from './errors'
import { DeploymentEventEmitter, deploymentEvents } from './events'
import { deployLightClientContract, deployMockLightClientContract, MockLightClientArgs } from './light-client'
import { DeployedContracts } from './types/contracts'

export interface DeploymentRunOptions {
  backend: DeploymentBackend

  /** Addresses to reuse instead of deploying. */
  deployed?: DeployedContracts

  /** Deploy LightClientMock instead of the upgradable LightClient. */
  mock?: boolean

  /** Constructor arguments for the mock. Defaults to a dummy genesis. */
  mockArgs?: MockLightClientArgs

  /** Receives the `.env` lines once the run is over, whether or not it succeeded. */
  sink: TextSink

  /** Where `sink` writes to, for reporting. */
  destination: string

  /** Optional: Custom event emitter instance. If not provided, uses the global singleton. */
  eventEmitter?: DeploymentEventEmitter
}

/**
 * Runs one deployment of the light client and its libraries, then writes out
 * every known address. A failed run still writes the addresses recorded
 * before the failure, and rethrows.
 */
export async function runDeployment(options: DeploymentRunOptions): Promise<string> {
  const events = options.eventEmitter || deploymentEvents
  const deployer = new Deployer({
    contracts: AddressCache.fromDeployed(options.deployed ?? {}),
    eventEmitter: events
  })

  try {
    const address = options.mock
      ? await deployMockLightClientContract(options.backend, deployer, options.mockArgs)
      : await deployLightClientContract(options.backend, deployer)

    events.emitEvent({
      type: 'deployment_completed',
      level: 'info',
      data: { address }
    })
    return address
  } catch (error) {
    events.emitEvent({
      type: 'deployment_failed',
      level: 'error',
      data: {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
        contract: error instanceof DeploymentError ? error.contract : undefined
      }
    })
    throw error
  } finally {
    deployer.contracts.export(options.sink)
    events.emitEvent({
      type: 'addresses_written',
      level: 'info',
      data: { destination: options.destination, count: deployer.contracts.size }
    })
  }
}
