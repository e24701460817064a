import { ethers } from 'ethers'
import { CONTRACT_IDS, ContractId, DeployedContracts, contractDisplayName } from './types/contracts'
import { validateAddress } from './utils/validation'

/**
 * Command-line flag for each predeployed address. The matching environment
 * variable is the contract's display name.
 */
export const PREDEPLOYED_FLAGS: Record<ContractId, { flag: string; key: string; description: string }> = {
  HotShot: {
    flag: 'hotshot',
    key: 'hotshot',
    description: 'Use an already-deployed HotShot.sol instead of deploying a new one'
  },
  PlonkVerifier: {
    flag: 'plonk-verifier',
    key: 'plonkVerifier',
    description: 'Use an already-deployed PlonkVerifier.sol instead of deploying a new one'
  },
  StateUpdateVK: {
    flag: 'light-client-state-update-vk',
    key: 'lightClientStateUpdateVk',
    description: 'Use an already-deployed LightClientStateUpdateVK.sol instead of deploying a new one'
  },
  LightClient: {
    flag: 'light-client',
    key: 'lightClient',
    description: 'Use an already-deployed LightClient.sol instead of deploying a new one'
  },
  LightClientProxy: {
    flag: 'light-client-proxy',
    key: 'lightClientProxy',
    description: 'Use an already-deployed LightClient.sol proxy instead of deploying a new one'
  }
}

/**
 * Collects predeployed addresses from parsed options, falling back to the
 * environment. Blank values are treated as absent; malformed ones, and
 * mixed-case ones with a bad checksum, are rejected.
 */
export function loadDeployedContracts(
  options: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): DeployedContracts {
  const deployed: DeployedContracts = {}
  for (const id of CONTRACT_IDS) {
    const { flag, key } = PREDEPLOYED_FLAGS[id]
    const envName = contractDisplayName(id)
    const fromOption = typeof options[key] === 'string' ? String(options[key]).trim() : ''
    const value = fromOption || (env[envName] ?? '').trim()
    if (value) {
      const label = `--${flag} / ${envName}`
      validateAddress(value, label)
      // Mixed-case input must carry a valid EIP-55 checksum
      if (!ethers.isAddress(value)) {
        throw new Error(`Invalid address checksum for ${label}: ${value}`)
      }
      deployed[id] = value
    }
  }
  return deployed
}
