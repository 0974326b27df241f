import { concatBytes, utf8ToBytes } from '@noble/hashes/utils';
import { canonicalizeBytes } from '../crypto/jcs.js';
import { sha256Bytes, sha256Hex } from '../crypto/hash.js';
import { signHex, verifyHex } from '../crypto/ed25519.js';
import { publicKeyFromDid } from '../identity/did.js';

export const EVENT_DOMAIN_PREFIX = 'stakegov:event:v1:';

export type EventEnvelope = Record<string, unknown>;

export interface EnvelopeFields {
  type: string;
  issuer: string;
  ts: number;
  nonce: number;
  payload: Record<string, unknown>;
  prev?: string;
}

export function stripSigHash(envelope: EventEnvelope): EventEnvelope {
  const { sig: _sig, hash: _hash, ...rest } = envelope;
  return rest;
}

export function canonicalEventBytes(envelope: EventEnvelope): Uint8Array {
  return canonicalizeBytes(stripSigHash(envelope));
}

export function eventHashHex(envelope: EventEnvelope): string {
  return sha256Hex(canonicalEventBytes(envelope));
}

export function eventSigningBytes(envelope: EventEnvelope): Uint8Array {
  const prefix = utf8ToBytes(EVENT_DOMAIN_PREFIX);
  return sha256Bytes(concatBytes(prefix, canonicalEventBytes(envelope)));
}

export async function signEvent(envelope: EventEnvelope, privateKey: Uint8Array): Promise<string> {
  return signHex(eventSigningBytes(envelope), privateKey);
}

/**
 * Build a v1 envelope and fill in its hash and signature. `prev` is dropped
 * when absent so the canonical form does not carry an undefined member.
 */
export async function sealEnvelope(
  fields: EnvelopeFields,
  privateKey: Uint8Array,
): Promise<EventEnvelope> {
  const base: EventEnvelope = {
    v: 1,
    type: fields.type,
    issuer: fields.issuer,
    ts: fields.ts,
    nonce: fields.nonce,
    payload: fields.payload,
    ...(fields.prev !== undefined ? { prev: fields.prev } : {}),
  };
  const hash = eventHashHex(base);
  const sig = await signEvent(base, privateKey);
  return { ...base, hash, sig };
}

/** Checks the hash and the issuer's signature over the envelope body. */
export async function verifyEnvelope(envelope: EventEnvelope): Promise<boolean> {
  const { issuer, sig, hash } = envelope;
  if (typeof issuer !== 'string' || typeof sig !== 'string' || typeof hash !== 'string') {
    return false;
  }
  if (eventHashHex(envelope) !== hash) {
    return false;
  }
  let publicKey: Uint8Array;
  try {
    publicKey = publicKeyFromDid(issuer);
  } catch {
    return false;
  }
  return verifyHex(sig, eventSigningBytes(envelope), publicKey);
}
