export interface LinkReference {
  start: number
  length: number
}

// solc layout: source file -> library name -> offsets
export type LinkReferences = Record<string, Record<string, LinkReference[]>>

/**
 * A creation image that may still contain library placeholders.
 */
export interface BytecodeArtifact {
  readonly contractName: string
  // Hex text, 0x prefixed; unresolved libraries appear as `__$<hash>$__`
  readonly object: string
  readonly linkReferences: LinkReferences
}

/**
 * A creation image with every library resolved, safe to broadcast.
 * Only produced by `assertFullyLinked`.
 */
export interface ResolvedArtifact {
  readonly contractName: string
  readonly bytecode: string
}
