import { CONTRACT_IDS, ContractId, DeployedContracts, contractDisplayName } from '../types/contracts'
import { validateAddress } from '../utils/validation'

/**
 * Anything text can be written to: a Node stream, or a collector in tests.
 */
export interface TextSink {
  write(chunk: string): unknown
}

/**
 * Addresses of contracts predeployed or deployed during the current run.
 */
export class AddressCache {
  private readonly addresses: Map<ContractId, string> = new Map()

  /**
   * Seeds a cache from caller-supplied addresses. Empty values are ignored.
   */
  public static fromDeployed(deployed: DeployedContracts): AddressCache {
    const cache = new AddressCache()
    for (const id of CONTRACT_IDS) {
      const address = deployed[id]
      if (address) {
        cache.record(id, address)
      }
    }
    return cache
  }

  public lookup(id: ContractId): string | undefined {
    return this.addresses.get(id)
  }

  public record(id: ContractId, address: string): void {
    this.addresses.set(id, validateAddress(address, id))
  }

  public entries(): Array<[ContractId, string]> {
    return Array.from(this.addresses.entries())
  }

  public get size(): number {
    return this.addresses.size
  }

  /**
   * Writes one `NAME=0x...` line per entry, address in lowercase.
   */
  public export(sink: TextSink): void {
    for (const [id, address] of this.entries()) {
      sink.write(`${contractDisplayName(id)}=${address.toLowerCase()}\n`)
    }
  }

  public toDotenv(): string {
    const lines: string[] = []
    this.export({ write: (chunk: string) => lines.push(chunk) })
    return lines.join('')
  }
}
