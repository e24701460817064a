import {
  loadArtifact,
  PLONK_VERIFIER_LIB,
  STATE_UPDATE_VK_LIB,
  STATE_UPDATE_VK_MOCK_LIB,
  TemplateName
} from './artifacts'
import { ConstructorArguments, DeploymentBackend, prepareDeployment } from './backend/types'
import { Deployer } from './deployer'
import { applyLink, assertFullyLinked } from './linking/linker'
import { BytecodeArtifact } from './types/artifacts'

/**
 * Finalized state the light client contract is constructed or initialized with.
 */
export interface LightClientState {
  viewNum: bigint
  blockHeight: bigint
  blockCommRoot: bigint
  feeLedgerComm: bigint
  stakeTableBlsKeyComm: bigint
  stakeTableSchnorrKeyComm: bigint
  stakeTableAmountComm: bigint
  threshold: bigint
}

export const LIGHT_CLIENT_STATE_ABI =
  'tuple(uint64 viewNum, uint64 blockHeight, uint256 blockCommRoot, uint256 feeLedgerComm, uint256 stakeTableBlsKeyComm, uint256 stakeTableSchnorrKeyComm, uint256 stakeTableAmountComm, uint256 threshold)'

// uint32 max; the mock treats it as "no limit"
export const MAX_HISTORY_SECONDS_DISABLED = 0xffffffff

export interface MockLightClientArgs {
  genesis: LightClientState
  maxHistorySeconds: number
}

/**
 * A fixed genesis state for test deployments.
 */
export function dummyGenesis(): LightClientState {
  return {
    viewNum: 0n,
    blockHeight: 0n,
    blockCommRoot: 0n,
    feeLedgerComm: 0n,
    stakeTableBlsKeyComm: 123n,
    stakeTableSchnorrKeyComm: 123n,
    stakeTableAmountComm: 20n,
    threshold: 1n
  }
}

export function lightClientStateTuple(state: LightClientState): bigint[] {
  return [
    state.viewNum,
    state.blockHeight,
    state.blockCommRoot,
    state.feeLedgerComm,
    state.stakeTableBlsKeyComm,
    state.stakeTableSchnorrKeyComm,
    state.stakeTableAmountComm,
    state.threshold
  ]
}

export function mockConstructorArguments(args?: MockLightClientArgs): ConstructorArguments {
  const { genesis, maxHistorySeconds } = args ?? {
    genesis: dummyGenesis(),
    maxHistorySeconds: MAX_HISTORY_SECONDS_DISABLED
  }
  return {
    types: [LIGHT_CLIENT_STATE_ABI, 'uint32'],
    values: [lightClientStateTuple(genesis), maxHistorySeconds]
  }
}

interface LightClientVariant {
  template: TemplateName
  vkTemplate: TemplateName
  vkLibrary: string
}

/**
 * Deploys both libraries, then links them into the variant's template.
 */
async function deployAndLink(
  backend: DeploymentBackend,
  deployer: Deployer,
  variant: LightClientVariant
): Promise<BytecodeArtifact> {
  const plonkVerifier = await deployer.deployTx(
    'PlonkVerifier',
    prepareDeployment(backend, assertFullyLinked(loadArtifact('PlonkVerifier')))
  )
  const vk = await deployer.deployTx(
    'StateUpdateVK',
    prepareDeployment(backend, assertFullyLinked(loadArtifact(variant.vkTemplate)))
  )

  const libraries: Array<[string, string]> = [
    [PLONK_VERIFIER_LIB, plonkVerifier],
    [variant.vkLibrary, vk]
  ]

  let bytecode = loadArtifact(variant.template)
  for (const [library, address] of libraries) {
    bytecode = applyLink(bytecode, library, address)
    deployer.events.emitEvent({
      type: 'library_linked',
      level: 'debug',
      data: { contractName: bytecode.contractName, library, address }
    })
  }
  return bytecode
}

/**
 * Deploys `LightClient.sol` for production.
 *
 * The contract is upgradable: its constructor is disabled, and the caller is
 * expected to call `initialize()` with the genesis state through a proxy.
 */
export async function deployLightClientContract(backend: DeploymentBackend, deployer: Deployer): Promise<string> {
  return deployer.deployFn('LightClient', async (contracts) => {
    const bytecode = await deployAndLink(backend, contracts, {
      template: 'LightClient',
      vkTemplate: 'LightClientStateUpdateVK',
      vkLibrary: STATE_UPDATE_VK_LIB
    })
    return prepareDeployment(backend, assertFullyLinked(bytecode)).send()
  })
}

/**
 * Deploys `LightClientMock.sol` for tests.
 *
 * The mock is not upgradable and its constructor initializes everything, so
 * no follow-up call is needed. Without `args` it starts from `dummyGenesis()`
 * with no state history limit.
 */
export async function deployMockLightClientContract(
  backend: DeploymentBackend,
  deployer: Deployer,
  args?: MockLightClientArgs
): Promise<string> {
  return deployer.deployFn('LightClient', async (contracts) => {
    const bytecode = await deployAndLink(backend, contracts, {
      template: 'LightClientMock',
      vkTemplate: 'LightClientStateUpdateVKMock',
      vkLibrary: STATE_UPDATE_VK_MOCK_LIB
    })
    return prepareDeployment(backend, assertFullyLinked(bytecode), mockConstructorArguments(args)).send()
  })
}
