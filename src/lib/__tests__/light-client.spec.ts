import {
  deployLightClientContract,
  deployMockLightClientContract,
  dummyGenesis,
  LIGHT_CLIENT_STATE_ABI,
  MAX_HISTORY_SECONDS_DISABLED
} from '../light-client'
import { Deployer } from '../deployer'
import { AddressCache } from '../contracts/cache'
import { DeploymentError } from '../errors'
import { DeploymentEventEmitter } from '../events'
import { FakeBackend, fakeAddress } from './fake-backend'

const hex = (address: string): string => address.slice(2)

describe('Light client deployment', () => {
  let backend: FakeBackend
  let eventEmitter: DeploymentEventEmitter

  beforeEach(() => {
    backend = new FakeBackend()
    eventEmitter = new DeploymentEventEmitter()
  })

  const newDeployer = (contracts?: AddressCache): Deployer => new Deployer({ contracts, eventEmitter })

  describe('deployLightClientContract', () => {
    it('should deploy both libraries, then the linked light client', async () => {
      const deployer = newDeployer()

      const address = await deployLightClientContract(backend, deployer)

      expect(address).toBe(fakeAddress(3))
      expect(backend.created.map(c => c.artifact.contractName)).toEqual([
        'PlonkVerifier',
        'LightClientStateUpdateVK',
        'LightClient'
      ])
      expect(backend.created[1].artifact.bytecode).toBe('0x600a80600b6000396000f3600260005260206000f3')
      expect(backend.created[2].artifact.bytecode).toBe(
        `0x602d80600b6000396000f373${hex(fakeAddress(1))}5073${hex(fakeAddress(2))}5000`
      )
      expect(deployer.contracts.entries()).toEqual([
        ['PlonkVerifier', fakeAddress(1)],
        ['StateUpdateVK', fakeAddress(2)],
        ['LightClient', fakeAddress(3)]
      ])
    })

    it('should deploy the upgradable contract without constructor arguments', async () => {
      await deployLightClientContract(backend, newDeployer())
      expect(backend.created[2].args).toBeUndefined()
    })

    it('should link predeployed libraries instead of deploying them', async () => {
      const plonk = fakeAddress(0x100)
      const deployer = newDeployer(AddressCache.fromDeployed({ PlonkVerifier: plonk }))

      await deployLightClientContract(backend, deployer)

      expect(backend.created.map(c => c.artifact.contractName)).toEqual(['LightClientStateUpdateVK', 'LightClient'])
      expect(backend.created[1].artifact.bytecode).toBe(
        `0x602d80600b6000396000f373${hex(plonk)}5073${hex(fakeAddress(1))}5000`
      )
    })

    it('should skip the libraries too when the light client is predeployed', async () => {
      const predeployed = fakeAddress(0x200)
      const deployer = newDeployer(AddressCache.fromDeployed({ LightClient: predeployed }))

      await expect(deployLightClientContract(backend, deployer)).resolves.toBe(predeployed)

      expect(backend.created).toHaveLength(0)
      expect(deployer.contracts.entries()).toEqual([['LightClient', predeployed]])
    })

    it('should emit one library_linked event per library', async () => {
      const linked: string[] = []
      eventEmitter.onEvent('library_linked', (event) => linked.push(event.data.library))

      await deployLightClientContract(backend, newDeployer())

      expect(linked).toEqual([
        'contracts/src/libraries/PlonkVerifier.sol:PlonkVerifier',
        'contracts/src/libraries/LightClientStateUpdateVK.sol:LightClientStateUpdateVK'
      ])
    })
  })

  describe('deployMockLightClientContract', () => {
    it('should use the mock verification key and template', async () => {
      const deployer = newDeployer()

      await deployMockLightClientContract(backend, deployer)

      expect(backend.created.map(c => c.artifact.contractName)).toEqual([
        'PlonkVerifier',
        'LightClientStateUpdateVKMock',
        'LightClientMock'
      ])
      expect(backend.created[2].artifact.bytecode).toBe(
        `0x603080600b6000396000f373${hex(fakeAddress(1))}5073${hex(fakeAddress(2))}5060015000`
      )
      expect(deployer.contracts.lookup('StateUpdateVK')).toBe(fakeAddress(2))
      expect(deployer.contracts.lookup('LightClient')).toBe(fakeAddress(3))
    })

    it('should default to the dummy genesis and no history limit', async () => {
      await deployMockLightClientContract(backend, newDeployer())

      expect(backend.created[2].args).toEqual({
        types: [LIGHT_CLIENT_STATE_ABI, 'uint32'],
        values: [[0n, 0n, 0n, 0n, 123n, 123n, 20n, 1n], 4294967295]
      })
      expect(MAX_HISTORY_SECONDS_DISABLED).toBe(4294967295)
    })

    it('should pass explicit constructor arguments through unchanged', async () => {
      const genesis = { ...dummyGenesis(), viewNum: 5n, blockHeight: 10n, threshold: 3n }

      await deployMockLightClientContract(backend, newDeployer(), { genesis, maxHistorySeconds: 864000 })

      expect(backend.created[2].args).toEqual({
        types: [LIGHT_CLIENT_STATE_ABI, 'uint32'],
        values: [[5n, 10n, 0n, 0n, 123n, 123n, 20n, 3n], 864000]
      })
    })

    it('should keep the libraries when the light client itself fails', async () => {
      backend.failOn('LightClientMock')
      const deployer = newDeployer()

      let caught: unknown
      try {
        await deployMockLightClientContract(backend, deployer)
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(DeploymentError)
      expect(caught).toMatchObject({ contract: 'LightClient' })
      expect(deployer.contracts.entries()).toEqual([
        ['PlonkVerifier', fakeAddress(1)],
        ['StateUpdateVK', fakeAddress(2)]
      ])
    })

    it('should report the library that failed', async () => {
      backend.failOn('LightClientStateUpdateVKMock')
      const deployer = newDeployer()

      await expect(deployMockLightClientContract(backend, deployer)).rejects.toMatchObject({ contract: 'StateUpdateVK' })

      expect(deployer.contracts.entries()).toEqual([['PlonkVerifier', fakeAddress(1)]])
      expect(backend.created).toHaveLength(1)
    })
  })
})
