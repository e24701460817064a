import { ethers } from 'ethers'
import { DeploymentEventEmitter, deploymentEvents } from '../events'
import { ResolvedArtifact } from '../types/artifacts'
import { ConstructorArguments, DeploymentBackend, encodeConstructorArguments } from './types'

export interface EthersBackendOptions {
  /** Fixed gas limit for every transaction. Estimated by the node when omitted. */
  gasLimit?: number

  /** Optional: Custom event emitter instance. If not provided, uses the global singleton. */
  eventEmitter?: DeploymentEventEmitter

  /** Provider to destroy on `dispose()`. */
  provider?: ethers.JsonRpcProvider
}

/**
 * Deployment backend that broadcasts through an ethers signer.
 */
export class EthersDeploymentBackend implements DeploymentBackend {
  private readonly signer: ethers.Signer
  private readonly gasLimit?: number
  private readonly events: DeploymentEventEmitter
  private readonly provider?: ethers.JsonRpcProvider

  constructor(signer: ethers.Signer, options: EthersBackendOptions = {}) {
    this.signer = signer
    this.gasLimit = options.gasLimit
    this.events = options.eventEmitter || deploymentEvents
    this.provider = options.provider
  }

  /**
   * Connects to `rpcUrl`. Without a private key the node's first account is
   * used as the sender.
   */
  public static async fromRpc(
    rpcUrl: string,
    privateKey: string | undefined,
    options: Omit<EthersBackendOptions, 'provider'> = {}
  ): Promise<EthersDeploymentBackend> {
    const provider = new ethers.JsonRpcProvider(rpcUrl)
    const signer = privateKey ? new ethers.Wallet(privateKey, provider) : await provider.getSigner()
    return new EthersDeploymentBackend(signer, { ...options, provider })
  }

  public async getSignerInfo(): Promise<{ address: string; chainId: number }> {
    const provider = this.signer.provider
    if (!provider) {
      throw new Error('Signer is not connected to a provider')
    }
    const [address, network] = await Promise.all([this.signer.getAddress(), provider.getNetwork()])
    return { address, chainId: Number(network.chainId) }
  }

  public async createContract(artifact: ResolvedArtifact, args?: ConstructorArguments): Promise<string> {
    const data = ethers.concat([artifact.bytecode, encodeConstructorArguments(args)])
    const receipt = await this.send({ to: null, data }, artifact.contractName)

    if (!receipt.contractAddress) {
      throw new Error(`Contract creation for ${artifact.contractName} did not return a contract address. Hash: ${receipt.hash}`)
    }
    return receipt.contractAddress
  }

  public async sendTransaction(to: string, data: string): Promise<ethers.TransactionReceipt> {
    return this.send({ to, data })
  }

  private async send(txParams: ethers.TransactionRequest, contractName?: string): Promise<ethers.TransactionReceipt> {
    if (this.gasLimit) {
      txParams.gasLimit = this.gasLimit
    }

    const tx = await this.signer.sendTransaction(txParams)
    const data = typeof txParams.data === 'string' ? txParams.data : '0x'

    this.events.emitEvent({
      type: 'transaction_sent',
      level: 'info',
      data: {
        to: typeof txParams.to === 'string' ? txParams.to : 'contract creation',
        contractName,
        dataPreview: data.substring(0, 42),
        txHash: tx.hash
      }
    })

    const receipt = await tx.wait()
    if (!receipt || receipt.status !== 1) {
      const what = contractName ? `Contract creation for ${contractName}` : `Transaction to ${String(txParams.to)}`
      throw new Error(`${what} failed (reverted). Hash: ${tx.hash}`)
    }

    this.events.emitEvent({
      type: 'transaction_confirmed',
      level: 'info',
      data: {
        txHash: tx.hash,
        blockNumber: receipt.blockNumber,
        contractAddress: receipt.contractAddress ?? undefined
      }
    })

    return receipt
  }

  /**
   * Destroys the provider so no connection keeps the process alive.
   */
  public async dispose(): Promise<void> {
    this.provider?.destroy()
  }
}
