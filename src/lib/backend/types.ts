import { ethers } from 'ethers'
import { ResolvedArtifact } from '../types/artifacts'

/**
 * ABI types and values appended to a creation image.
 */
export interface ConstructorArguments {
  types: ReadonlyArray<string | ethers.ParamType>
  values: ReadonlyArray<unknown>
}

/**
 * The chain a deployment run talks to.
 */
export interface DeploymentBackend {
  /**
   * Broadcasts a creation transaction, waits for it to be mined and returns
   * the address of the new contract.
   */
  createContract(artifact: ResolvedArtifact, args?: ConstructorArguments): Promise<string>

  /**
   * Sends a call to an existing contract. Used by callers for follow-up
   * initialization; the deployment flow itself never calls it.
   */
  sendTransaction(to: string, data: string): Promise<ethers.TransactionReceipt>
}

/**
 * A creation transaction that is ready to go, the way a contract factory's
 * deploy transaction is.
 */
export class CreationTransaction {
  constructor(
    private readonly backend: DeploymentBackend,
    public readonly artifact: ResolvedArtifact,
    public readonly args?: ConstructorArguments
  ) {}

  public send(): Promise<string> {
    return this.backend.createContract(this.artifact, this.args)
  }
}

export function prepareDeployment(
  backend: DeploymentBackend,
  artifact: ResolvedArtifact,
  args?: ConstructorArguments
): CreationTransaction {
  return new CreationTransaction(backend, artifact, args)
}

export function encodeConstructorArguments(args?: ConstructorArguments): string {
  if (!args || args.types.length === 0) {
    return '0x'
  }
  return ethers.AbiCoder.defaultAbiCoder().encode(args.types, args.values)
}
