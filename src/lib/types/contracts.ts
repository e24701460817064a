/**
 * Every contract this tool knows how to deploy or track, in the order they
 * are seeded and written out.
 */
export const CONTRACT_IDS = [
  'HotShot',
  'PlonkVerifier',
  'StateUpdateVK',
  'LightClient',
  'LightClientProxy'
] as const

export type ContractId = typeof CONTRACT_IDS[number]

// Environment variable names, also used as keys in the written .env output
const DISPLAY_NAMES: Record<ContractId, string> = {
  HotShot: 'ESPRESSO_SEQUENCER_HOTSHOT_ADDRESS',
  PlonkVerifier: 'ESPRESSO_SEQUENCER_PLONK_VERIFIER_ADDRESS',
  StateUpdateVK: 'ESPRESSO_SEQUENCER_LIGHT_CLIENT_STATE_UPDATE_VK_ADDRESS',
  LightClient: 'ESPRESSO_SEQUENCER_LIGHT_CLIENT_ADDRESS',
  LightClientProxy: 'ESPRESSO_SEQUENCER_LIGHT_CLIENT_PROXY_ADDRESS'
}

export function contractDisplayName(id: ContractId): string {
  return DISPLAY_NAMES[id]
}

/**
 * Addresses of contracts that were deployed before this run.
 * Any non-empty value causes that contract (and everything it would have
 * deployed first) to be skipped.
 */
export type DeployedContracts = Partial<Record<ContractId, string>>
