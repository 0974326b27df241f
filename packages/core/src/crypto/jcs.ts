import canonicalizeModule from 'canonicalize';
import { utf8ToBytes } from '@noble/hashes/utils';

const canonicalize = canonicalizeModule as unknown as (input: unknown) => string | undefined;

/**
 * RFC 8785 (JCS) serialization. Envelopes are hashed and signed over this
 * form, and the event log only accepts bytes already in it.
 */
export function canonicalizeJson(input: unknown): string {
  const out = canonicalize(input);
  if (out === undefined) {
    throw new Error('Unable to canonicalize input');
  }
  return out;
}

export function canonicalizeBytes(input: unknown): Uint8Array {
  return utf8ToBytes(canonicalizeJson(input));
}
