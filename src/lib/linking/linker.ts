import { ethers } from 'ethers'
import { ArtifactLoadError, LinkingError } from '../errors'
import { BytecodeArtifact, LinkReferences, ResolvedArtifact } from '../types/artifacts'
import { isAddressString, validateHexData } from '../utils/validation'

const ADDRESS_HEX_LENGTH = 40
const PLACEHOLDER_REGEX = /__\$[0-9a-fA-F]{34}\$__/

/**
 * The placeholder solc leaves for a library: `__$` + the first 34 hex digits
 * of keccak256(`<sourceFile>:<library>`) + `$__`.
 */
export function libraryPlaceholder(qualifiedName: string): string {
  return `__$${ethers.id(qualifiedName).slice(2, 36)}$__`
}

function splitQualifiedName(contractName: string, qualifiedName: string): { file: string; library: string } {
  const idx = qualifiedName.lastIndexOf(':')
  if (idx <= 0 || idx === qualifiedName.length - 1) {
    throw new LinkingError(contractName, qualifiedName, 'expected a fully qualified name of the form <file>:<library>')
  }
  return { file: qualifiedName.slice(0, idx), library: qualifiedName.slice(idx + 1) }
}

function withoutReference(references: LinkReferences, file: string, library: string): LinkReferences {
  const result: LinkReferences = {}
  for (const [sourceFile, libraries] of Object.entries(references)) {
    const kept = Object.fromEntries(
      Object.entries(libraries).filter(([name]) => sourceFile !== file || name !== library)
    )
    if (Object.keys(kept).length > 0) {
      result[sourceFile] = kept
    }
  }
  return result
}

/**
 * Substitutes `address` for every reference to `qualifiedName`. References to
 * other libraries are left as they are.
 */
export function applyLink(artifact: BytecodeArtifact, qualifiedName: string, address: string): BytecodeArtifact {
  const { contractName } = artifact
  const { file, library } = splitQualifiedName(contractName, qualifiedName)
  if (!isAddressString(address)) {
    throw new LinkingError(contractName, qualifiedName, `invalid address ${address}`)
  }

  const addressHex = address.slice(2).toLowerCase()
  let body = artifact.object.slice(2)

  for (const { start, length } of artifact.linkReferences[file]?.[library] ?? []) {
    if (length * 2 !== ADDRESS_HEX_LENGTH) {
      throw new LinkingError(contractName, qualifiedName, `reference at ${start} is ${length} bytes long, expected 20`)
    }
    const from = start * 2
    const to = from + ADDRESS_HEX_LENGTH
    if (to > body.length) {
      throw new LinkingError(contractName, qualifiedName, `reference at ${start} is outside the bytecode`)
    }
    body = body.slice(0, from) + addressHex + body.slice(to)
  }

  // Artifacts without linkReferences only carry the placeholder text
  body = body.split(libraryPlaceholder(qualifiedName)).join(addressHex)

  return Object.freeze({
    contractName,
    object: `0x${body}`,
    linkReferences: withoutReference(artifact.linkReferences, file, library)
  })
}

export function isUnlinked(artifact: BytecodeArtifact): boolean {
  return Object.keys(artifact.linkReferences).length > 0 || artifact.object.includes('__')
}

/**
 * Proves that no library reference is left and hands back the deployable image.
 * Throws a `LinkingError` naming the first reference still unresolved.
 */
export function assertFullyLinked(artifact: BytecodeArtifact): ResolvedArtifact {
  const { contractName } = artifact

  for (const [file, libraries] of Object.entries(artifact.linkReferences)) {
    const [library] = Object.keys(libraries)
    if (library !== undefined) {
      throw new LinkingError(contractName, `${file}:${library}`)
    }
  }

  const placeholder = PLACEHOLDER_REGEX.exec(artifact.object)
  if (placeholder) {
    throw new LinkingError(contractName, placeholder[0])
  }

  try {
    return { contractName, bytecode: validateHexData(artifact.object, contractName) }
  } catch (error) {
    throw new ArtifactLoadError(contractName, error instanceof Error ? error.message : String(error))
  }
}
