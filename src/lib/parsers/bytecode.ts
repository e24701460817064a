import { ArtifactLoadError } from '../errors'
import { BytecodeArtifact, LinkReference, LinkReferences } from '../types/artifacts'

// Hex digits, with 40-character library placeholders allowed in between
const UNLINKED_HEX_REGEX = /^(?:[0-9a-fA-F]|__\$[0-9a-fA-F]{34}\$__)*$/

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseLinkReference(value: unknown, where: string, contractName: string): LinkReference {
  if (
    !isRecord(value) ||
    typeof value.start !== 'number' ||
    typeof value.length !== 'number' ||
    !Number.isInteger(value.start) ||
    !Number.isInteger(value.length) ||
    value.start < 0 ||
    value.length <= 0
  ) {
    throw new ArtifactLoadError(contractName, `invalid link reference for ${where}`)
  }
  return { start: value.start, length: value.length }
}

function parseLinkReferences(value: unknown, byteLength: number, contractName: string): LinkReferences {
  if (value === undefined) {
    return {}
  }
  if (!isRecord(value)) {
    throw new ArtifactLoadError(contractName, 'linkReferences must be an object')
  }

  const references: LinkReferences = {}
  for (const [file, libraries] of Object.entries(value)) {
    if (!isRecord(libraries)) {
      throw new ArtifactLoadError(contractName, `linkReferences for ${file} must be an object`)
    }
    references[file] = {}
    for (const [library, offsets] of Object.entries(libraries)) {
      const where = `${file}:${library}`
      if (!Array.isArray(offsets)) {
        throw new ArtifactLoadError(contractName, `link references for ${where} must be an array`)
      }
      references[file][library] = offsets.map((offset: unknown) => {
        const reference = parseLinkReference(offset, where, contractName)
        if (reference.start + reference.length > byteLength) {
          throw new ArtifactLoadError(contractName, `link reference for ${where} at ${reference.start} is outside the bytecode`)
        }
        return reference
      })
    }
  }
  return references
}

/**
 * Parses an unlinked creation image. Accepts either a bare hex string or the
 * solc/foundry `{ object, linkReferences }` shape.
 */
export function parseBytecodeArtifact(json: unknown, contractName: string): BytecodeArtifact {
  const object = typeof json === 'string' ? json : isRecord(json) ? json.object : undefined
  if (typeof object !== 'string') {
    throw new ArtifactLoadError(contractName, 'missing bytecode object')
  }
  if (!object.startsWith('0x')) {
    throw new ArtifactLoadError(contractName, `bytecode must start with '0x'`)
  }

  const body = object.slice(2)
  if (!UNLINKED_HEX_REGEX.test(body)) {
    throw new ArtifactLoadError(contractName, 'bytecode contains characters that are neither hex nor library placeholders')
  }
  if (body.length % 2 !== 0) {
    throw new ArtifactLoadError(contractName, 'bytecode has an odd number of hex digits')
  }

  const linkReferences = parseLinkReferences(isRecord(json) ? json.linkReferences : undefined, body.length / 2, contractName)

  return Object.freeze({ contractName, object, linkReferences })
}
