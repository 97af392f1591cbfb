import { describe, it, expect } from 'vitest';
import { HDKey } from '@scure/bip32';
import { XpubAddressGenerator } from '../address-generator.js';
import { MemoryStore } from '../memory-store.js';
import { isTronAddress, tronAddressFromPublicKey } from '../tron.js';

const master = HDKey.fromMasterSeed(new Uint8Array(32).fill(7));
const account = master.derive("m/44'/195'/0'");

function expectedAddress(index: number): string {
  const key = master.derive(`m/44'/195'/0'/0/${index}`).publicKey;
  if (!key) throw new Error('derivation failed');
  return tronAddressFromPublicKey(key);
}

describe('XpubAddressGenerator', () => {
  it('derives external-chain addresses at consecutive reserved indexes', async () => {
    const store = new MemoryStore();
    const generator = new XpubAddressGenerator(account.publicExtendedKey, store);

    const first = await generator.generate(3);
    const second = await generator.generate(2);

    expect(first.map((a) => a.derivationIndex)).toEqual([0, 1, 2]);
    expect(second.map((a) => a.derivationIndex)).toEqual([3, 4]);
    expect([...first, ...second].map((a) => a.address)).toEqual([0, 1, 2, 3, 4].map(expectedAddress));
    expect(first.every((a) => isTronAddress(a.address))).toBe(true);
  });

  it('returns nothing for a non-positive count without reserving indexes', async () => {
    const store = new MemoryStore();
    const generator = new XpubAddressGenerator(account.publicExtendedKey, store);

    expect(await generator.generate(0)).toEqual([]);
    expect(await store.reserveDerivationIndexes(1)).toBe(0);
  });

  it('refuses an extended private key', () => {
    expect(() => new XpubAddressGenerator(account.privateExtendedKey, new MemoryStore())).toThrow(
      'ADDRESS_XPUB must be an extended public key, not a private one',
    );
  });
});
