import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { sha256Bytes } from '../crypto/hash.js';

// Multibase 'f' = lowercase base16.
const DID_PREFIX = 'did:stake:f';
const ADDRESS_PREFIX = 'stake';
const ADDRESS_BYTES = 20;
const PUBLIC_KEY_BYTES = 32;

export function didFromPublicKey(publicKey: Uint8Array): string {
  if (publicKey.length !== PUBLIC_KEY_BYTES) {
    throw new Error(`public key must be ${PUBLIC_KEY_BYTES} bytes`);
  }
  return `${DID_PREFIX}${bytesToHex(publicKey)}`;
}

export function publicKeyFromDid(did: string): Uint8Array {
  if (!did.startsWith(DID_PREFIX)) {
    throw new Error('Invalid did:stake prefix');
  }
  const hex = did.slice(DID_PREFIX.length);
  if (hex.length !== PUBLIC_KEY_BYTES * 2 || !/^[0-9a-f]+$/.test(hex)) {
    throw new Error('Invalid did:stake key encoding');
  }
  return hexToBytes(hex);
}

export function isValidDid(did: string): boolean {
  try {
    publicKeyFromDid(did);
    return true;
  } catch {
    return false;
  }
}

/** Short account address: prefix + first 20 bytes of sha256(publicKey). */
export function addressFromPublicKey(publicKey: Uint8Array): string {
  return `${ADDRESS_PREFIX}${bytesToHex(sha256Bytes(publicKey).slice(0, ADDRESS_BYTES))}`;
}

export function addressFromDid(did: string): string {
  return addressFromPublicKey(publicKeyFromDid(did));
}
