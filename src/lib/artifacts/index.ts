import { BytecodeArtifact } from '../types/artifacts'
import { parseBytecodeArtifact } from '../parsers/bytecode'

// The creation images are imported rather than read from disk, so they are
// compiled into the program and nothing needs to ship next to it.
import plonkVerifierJson from './PlonkVerifier.json'
import stateUpdateVkJson from './LightClientStateUpdateVK.json'
import stateUpdateVkMockJson from './LightClientStateUpdateVKMock.json'
import lightClientJson from './LightClient.json'
import lightClientMockJson from './LightClientMock.json'

const TEMPLATES = {
  PlonkVerifier: plonkVerifierJson,
  LightClientStateUpdateVK: stateUpdateVkJson,
  LightClientStateUpdateVKMock: stateUpdateVkMockJson,
  LightClient: lightClientJson,
  LightClientMock: lightClientMockJson
}

export type TemplateName = keyof typeof TEMPLATES

/** Fully qualified names of the linked libraries, as they appear in `linkReferences`. */
export const PLONK_VERIFIER_LIB = 'contracts/src/libraries/PlonkVerifier.sol:PlonkVerifier'
export const STATE_UPDATE_VK_LIB = 'contracts/src/libraries/LightClientStateUpdateVK.sol:LightClientStateUpdateVK'
export const STATE_UPDATE_VK_MOCK_LIB = 'contracts/tests/mocks/LightClientStateUpdateVKMock.sol:LightClientStateUpdateVKMock'

const loaded = new Map<TemplateName, BytecodeArtifact>()

/**
 * Returns the embedded creation image for `name`.
 * @throws ArtifactLoadError if the embedded template is malformed.
 */
export function loadArtifact(name: TemplateName): BytecodeArtifact {
  let artifact = loaded.get(name)
  if (!artifact) {
    artifact = parseBytecodeArtifact(TEMPLATES[name], name)
    loaded.set(name, artifact)
  }
  return artifact
}
