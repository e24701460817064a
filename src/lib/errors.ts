import { ContractId } from './types/contracts'

/**
 * Base class for every failure raised by the deployer.
 */
export class DeployerError extends Error {
  public readonly code: string
  public readonly context?: Record<string, unknown>

  constructor(message: string, code: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options)
    this.name = this.constructor.name
    this.code = code
    this.context = context

    Error.captureStackTrace(this, this.constructor)
  }
}

/**
 * A library reference is still unresolved, or could not be patched.
 */
export class LinkingError extends DeployerError {
  public readonly reference: string
  public readonly contractName: string

  constructor(contractName: string, reference: string, detail?: string) {
    super(
      detail
        ? `Failed to link ${reference} into ${contractName}: ${detail}`
        : `${contractName} has an unresolved library reference: ${reference}`,
      'LINKING_ERROR',
      { contractName, reference }
    )
    this.reference = reference
    this.contractName = contractName
  }
}

/**
 * The creation of a contract failed. `cause` holds the underlying error.
 */
export class DeploymentError extends DeployerError {
  public readonly contract: ContractId

  constructor(contract: ContractId, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Failed to deploy ${contract}: ${reason}`, 'DEPLOYMENT_ERROR', { contract }, { cause })
    this.contract = contract
  }
}

/**
 * An embedded bytecode template is malformed. Templates are fixed at build
 * time, so this always points at a broken build.
 */
export class ArtifactLoadError extends DeployerError {
  public readonly contractName: string

  constructor(contractName: string, detail: string) {
    super(`Malformed bytecode artifact for ${contractName}: ${detail}`, 'ARTIFACT_LOAD_ERROR', { contractName })
    this.contractName = contractName
  }
}
