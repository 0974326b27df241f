import { describe, expect, it } from 'vitest';
import { utf8ToBytes } from '@noble/hashes/utils';
import { generateKeypair, signHex, verifyHex } from '../src/crypto/ed25519.js';
import { sha256Hex } from '../src/crypto/hash.js';
import { canonicalizeJson } from '../src/crypto/jcs.js';
import {
  addressFromPublicKey,
  didFromPublicKey,
  isValidDid,
  publicKeyFromDid,
} from '../src/identity/did.js';
import { eventHashHex, sealEnvelope, verifyEnvelope } from '../src/protocol/event-hash.js';

describe('hashing and canonical json', () => {
  it('computes sha256 hex', () => {
    expect(sha256Hex(utf8ToBytes('abc'))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
  });

  it('sorts keys and keeps array order', () => {
    expect(canonicalizeJson({ b: 1, a: [true, null, 'x'] })).toBe('{"a":[true,null,"x"],"b":1}');
  });
});

describe('did:stake identities', () => {
  const publicKey = new Uint8Array(32).fill(1);

  it('round-trips a public key through a did', () => {
    const did = didFromPublicKey(publicKey);
    expect(did).toBe(`did:stake:f${'01'.repeat(32)}`);
    expect(publicKeyFromDid(did)).toEqual(publicKey);
    expect(isValidDid(did)).toBe(true);
  });

  it('rejects malformed dids', () => {
    expect(() => publicKeyFromDid('did:key:zabc')).toThrow('Invalid did:stake prefix');
    expect(() => publicKeyFromDid('did:stake:fabcd')).toThrow('Invalid did:stake key encoding');
    expect(isValidDid('alice')).toBe(false);
  });

  it('derives a 20-byte address', () => {
    const address = addressFromPublicKey(publicKey);
    expect(address.startsWith('stake')).toBe(true);
    expect(address).toHaveLength(5 + 40);
  });
});

describe('ed25519 signatures', () => {
  it('signs and verifies messages', async () => {
    const keys = await generateKeypair();
    const message = utf8ToBytes('vote for proposal-1');
    const sig = await signHex(message, keys.privateKey);
    expect(await verifyHex(sig, message, keys.publicKey)).toBe(true);
    expect(await verifyHex(sig, utf8ToBytes('vote against proposal-1'), keys.publicKey)).toBe(false);
  });

  it('treats a malformed signature as invalid', async () => {
    const keys = await generateKeypair();
    expect(await verifyHex('zz', utf8ToBytes('x'), keys.publicKey)).toBe(false);
  });
});

describe('event envelopes', () => {
  it('seals and verifies an envelope', async () => {
    const keys = await generateKeypair();
    const issuer = didFromPublicKey(keys.publicKey);
    const envelope = await sealEnvelope(
      { type: 'test.event', issuer, ts: 1000, nonce: 1, payload: { ok: true } },
      keys.privateKey,
    );

    expect(envelope.v).toBe(1);
    expect('prev' in envelope).toBe(false);
    expect(envelope.hash).toBe(eventHashHex(envelope));
    expect(await verifyEnvelope(envelope)).toBe(true);
  });

  it('fails verification when the payload is altered', async () => {
    const keys = await generateKeypair();
    const issuer = didFromPublicKey(keys.publicKey);
    const envelope = await sealEnvelope(
      { type: 'test.event', issuer, ts: 1000, nonce: 1, payload: { amount: '10' } },
      keys.privateKey,
    );
    expect(await verifyEnvelope({ ...envelope, payload: { amount: '11' } })).toBe(false);
  });

  it('fails verification for a different issuer', async () => {
    const keys = await generateKeypair();
    const other = await generateKeypair();
    const envelope = await sealEnvelope(
      {
        type: 'test.event',
        issuer: didFromPublicKey(other.publicKey),
        ts: 1000,
        nonce: 1,
        payload: {},
      },
      keys.privateKey,
    );
    expect(await verifyEnvelope(envelope)).toBe(false);
  });
});
