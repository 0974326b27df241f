import * as ed25519 from '@noble/ed25519';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';

export interface Keypair {
  privateKey: Uint8Array;
  publicKey: Uint8Array;
}

export async function generateKeypair(): Promise<Keypair> {
  const privateKey = ed25519.utils.randomPrivateKey();
  const publicKey = await ed25519.getPublicKeyAsync(privateKey);
  return { privateKey, publicKey };
}

export async function publicKeyFromPrivateKey(privateKey: Uint8Array): Promise<Uint8Array> {
  return ed25519.getPublicKeyAsync(privateKey);
}

export async function signHex(message: Uint8Array, privateKey: Uint8Array): Promise<string> {
  const sig = await ed25519.signAsync(message, privateKey);
  return bytesToHex(sig);
}

/** A malformed signature verifies as false. */
export async function verifyHex(
  signatureHex: string,
  message: Uint8Array,
  publicKey: Uint8Array,
): Promise<boolean> {
  let sig: Uint8Array;
  try {
    sig = hexToBytes(signatureHex);
  } catch {
    return false;
  }
  return ed25519.verifyAsync(sig, message, publicKey);
}
