import { AddressCache } from '../cache'

const ADDRESS_A = '0x' + 'AA'.repeat(20)
const ADDRESS_B = '0x' + 'bB'.repeat(20)

describe('AddressCache', () => {
  it('should return undefined for contracts it does not know', () => {
    const cache = new AddressCache()
    expect(cache.lookup('LightClient')).toBeUndefined()
  })

  it('should return recorded addresses unchanged', () => {
    const cache = new AddressCache()
    cache.record('PlonkVerifier', ADDRESS_A)
    expect(cache.lookup('PlonkVerifier')).toBe(ADDRESS_A)
  })

  it('should overwrite an existing entry on record', () => {
    const cache = new AddressCache()
    cache.record('PlonkVerifier', ADDRESS_A)
    cache.record('PlonkVerifier', ADDRESS_B)
    expect(cache.entries()).toEqual([['PlonkVerifier', ADDRESS_B]])
  })

  it('should reject values that are not 20-byte addresses', () => {
    const cache = new AddressCache()
    expect(() => cache.record('LightClient', '0x1234')).toThrow('Invalid address format for LightClient: 0x1234')
    expect(cache.size).toBe(0)
  })

  describe('fromDeployed', () => {
    it('should seed non-empty values in table order', () => {
      const cache = AddressCache.fromDeployed({
        LightClient: ADDRESS_B,
        HotShot: '',
        PlonkVerifier: ADDRESS_A
      })

      expect(cache.entries()).toEqual([
        ['PlonkVerifier', ADDRESS_A],
        ['LightClient', ADDRESS_B]
      ])
    })
  })

  describe('export', () => {
    it('should write one lowercase NAME=address line per entry', () => {
      const cache = new AddressCache()
      cache.record('PlonkVerifier', ADDRESS_A)
      cache.record('LightClient', ADDRESS_B)

      const chunks: string[] = []
      cache.export({ write: (chunk: string) => chunks.push(chunk) })

      expect(chunks).toEqual([
        `ESPRESSO_SEQUENCER_PLONK_VERIFIER_ADDRESS=0x${'aa'.repeat(20)}\n`,
        `ESPRESSO_SEQUENCER_LIGHT_CLIENT_ADDRESS=0x${'bb'.repeat(20)}\n`
      ])
    })

    it('should write nothing for an empty cache', () => {
      expect(new AddressCache().toDotenv()).toBe('')
    })

    it('should render the same text as a string', () => {
      const cache = AddressCache.fromDeployed({ LightClientProxy: ADDRESS_A })
      expect(cache.toDotenv()).toBe(`ESPRESSO_SEQUENCER_LIGHT_CLIENT_PROXY_ADDRESS=0x${'aa'.repeat(20)}\n`)
    })
  })
})
