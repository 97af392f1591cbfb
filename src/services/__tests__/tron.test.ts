import { describe, it, expect } from 'vitest';
import { getBytes, SigningKey } from 'ethers';
import { isTronAddress, tronAddressFromHex, tronAddressFromPublicKey, tronAddressToHex } from '../tron.js';

const USDT_CONTRACT = 'TR7NHqjeKQxGTCi8q8ZY4pL8otSzgjLj6t';
const USDT_CONTRACT_HEX = '41a614f803b6fd780986a42c78ec9c7f77e6ded13c';

describe('TRON address encoding', () => {
  it('encodes 41-prefixed hex as Base58Check', () => {
    expect(tronAddressFromHex(USDT_CONTRACT_HEX)).toBe(USDT_CONTRACT);
    expect(tronAddressFromHex(`0x${USDT_CONTRACT_HEX}`)).toBe(USDT_CONTRACT);
  });

  it('decodes back to hex', () => {
    expect(tronAddressToHex(USDT_CONTRACT)).toBe(USDT_CONTRACT_HEX);
  });

  it('rejects hex without the mainnet prefix', () => {
    expect(() => tronAddressFromHex('42a614f803b6fd780986a42c78ec9c7f77e6ded13c')).toThrow('Not a TRON hex address');
    expect(() => tronAddressFromHex('a614f803b6fd780986a42c78ec9c7f77e6ded13c')).toThrow('Not a TRON hex address');
  });

  it('validates format and checksum', () => {
    expect(isTronAddress(USDT_CONTRACT)).toBe(true);
    expect(isTronAddress('TR7NHqjeKQxGTCi8q8ZY4pL8otSzgjLj6u')).toBe(false);
    expect(isTronAddress('0xa614f803b6fd780986a42c78ec9c7f77e6ded13c')).toBe(false);
    expect(isTronAddress('TR7NHqjeKQxGTCi8q8ZY4pL8otSzgjLj6')).toBe(false);
    expect(isTronAddress('')).toBe(false);
  });

  it('derives the address from a public key like an EVM address with the 41 prefix', () => {
    const key = new SigningKey(`0x${'00'.repeat(31)}01`);
    // EVM address of private key 1 is 0x7E5F4552091A69125d5DfCb7b8C2659029395Bdf
    const expected = tronAddressFromHex('417e5f4552091a69125d5dfcb7b8c2659029395bdf');

    expect(tronAddressFromPublicKey(getBytes(key.compressedPublicKey))).toBe(expected);
    expect(tronAddressFromPublicKey(getBytes(key.publicKey))).toBe(expected);
  });
});
