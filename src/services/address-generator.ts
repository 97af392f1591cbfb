import { HDKey } from '@scure/bip32';
import type { AddressStore } from './store.js';
import type { NewAddress } from './types.js';
import { tronAddressFromPublicKey } from './tron.js';

/** Source of fresh pool addresses used by replenishment. */
export interface AddressGenerator {
  generate(count: number): Promise<NewAddress[]>;
}

// ═══════════════════════════════════════════════════════════════════════════════
//  TRON: BIP-44 account xpub (m/44'/195'/0'), external chain /0/{index}
//  Only the public half is ever loaded: the service can derive deposit
//  addresses but cannot spend from them.
// ═══════════════════════════════════════════════════════════════════════════════

export class XpubAddressGenerator implements AddressGenerator {
  private readonly external: HDKey;

  constructor(
    xpub: string,
    private readonly counter: Pick<AddressStore, 'reserveDerivationIndexes'>,
  ) {
    const account = HDKey.fromExtendedKey(xpub);
    if (account.privateKey) {
      throw new Error('ADDRESS_XPUB must be an extended public key, not a private one');
    }
    this.external = account.deriveChild(0);
  }

  deriveAt(index: number): string {
    const child = this.external.deriveChild(index);
    if (!child.publicKey) throw new Error(`TRON derivation failed at index ${index}`);
    return tronAddressFromPublicKey(child.publicKey);
  }

  async generate(count: number): Promise<NewAddress[]> {
    if (count <= 0) return [];
    const first = await this.counter.reserveDerivationIndexes(count);
    return Array.from({ length: count }, (_, i) => ({
      address: this.deriveAt(first + i),
      derivationIndex: first + i,
    }));
  }
}
