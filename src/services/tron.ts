import { sha256 } from '@noble/hashes/sha2.js';
import { computeAddress, decodeBase58, encodeBase58, getBytes, hexlify, toBeArray } from 'ethers';

// TRON mainnet addresses: Base58Check(0x41 || last 20 bytes of keccak256(pubkey))
const ADDRESS_PREFIX = 0x41;
const ADDRESS_BYTES = 21;
const CHECKSUM_BYTES = 4;

function checksum(payload: Uint8Array): Uint8Array {
  return sha256(sha256(payload)).slice(0, CHECKSUM_BYTES);
}

/** `41`-prefixed 21-byte hex → `T...` address. */
export function tronAddressFromHex(hex: string): string {
  const payload = getBytes(hex.startsWith('0x') ? hex : `0x${hex}`);
  if (payload.length !== ADDRESS_BYTES || payload[0] !== ADDRESS_PREFIX) {
    throw new Error(`Not a TRON hex address: ${hex}`);
  }
  const full = new Uint8Array(ADDRESS_BYTES + CHECKSUM_BYTES);
  full.set(payload);
  full.set(checksum(payload), ADDRESS_BYTES);
  return encodeBase58(full);
}

/** `T...` address → lower-case `41`-prefixed hex, or null when the checksum fails. */
export function tronAddressToHex(address: string): string | null {
  let bytes: Uint8Array;
  try {
    bytes = toBeArray(decodeBase58(address));
  } catch {
    return null;
  }
  if (bytes.length !== ADDRESS_BYTES + CHECKSUM_BYTES || bytes[0] !== ADDRESS_PREFIX) return null;

  const payload = bytes.slice(0, ADDRESS_BYTES);
  const expected = checksum(payload);
  const actual = bytes.slice(ADDRESS_BYTES);
  for (let i = 0; i < CHECKSUM_BYTES; i++) {
    if (expected[i] !== actual[i]) return null;
  }
  return hexlify(payload).slice(2);
}

export function isTronAddress(address: string): boolean {
  if (!/^T[1-9A-HJ-NP-Za-km-z]{33}$/.test(address)) return false;
  return tronAddressToHex(address) !== null;
}

/** Compressed or uncompressed secp256k1 public key → `T...` address. */
export function tronAddressFromPublicKey(publicKey: Uint8Array): string {
  const evm = computeAddress(hexlify(publicKey));
  return tronAddressFromHex(`41${evm.slice(2)}`);
}
