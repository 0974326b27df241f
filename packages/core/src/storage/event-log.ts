import { utf8ToBytes } from '@noble/hashes/utils';
import { canonicalizeBytes } from '../crypto/jcs.js';
import { EventEnvelope, eventHashHex, verifyEnvelope } from '../protocol/event-hash.js';
import { KVStore } from './kv.js';

const PREFIX_EVENT = 'ev:';
const PREFIX_LOG_SEQ = 'log:seq:';
const PREFIX_LOG_HASH = 'log:hash:';
const KEY_LOG_SEQ = 'meta:logseq';

const textDecoder = new TextDecoder();

function bytesToUtf8(bytes: Uint8Array): string {
  return textDecoder.decode(bytes);
}

function encodeSeq(seq: number): string {
  return seq.toString(16).padStart(16, '0');
}

function decodeSeq(value: string): number {
  return Number.parseInt(value, 16);
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEnvelopeBytes(bytes: Uint8Array): EventEnvelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bytesToUtf8(bytes));
  } catch {
    throw new Error('Invalid event bytes (not JSON)');
  }
  if (!isRecord(parsed)) {
    throw new Error('Invalid event bytes (not an object)');
  }
  return parsed;
}

function validateEventBytes(hash: string, eventBytes: Uint8Array): EventEnvelope {
  const envelope = parseEnvelopeBytes(eventBytes);
  const envelopeHash = envelope.hash;
  if (typeof envelopeHash !== 'string' || envelopeHash.length === 0) {
    throw new Error('Event envelope missing hash');
  }
  if (eventHashHex(envelope) !== envelopeHash || envelopeHash !== hash) {
    throw new Error('Event hash mismatch');
  }
  if (!bytesEqual(canonicalizeBytes(envelope), eventBytes)) {
    throw new Error('Event bytes are not canonical JCS');
  }
  return envelope;
}

/**
 * Append-only, hash-addressed log of event envelopes on top of a KVStore.
 * Each envelope is stored once under its hash and given the next sequence
 * number; appending a hash that is already logged is a no-op.
 */
export class EventLog {
  constructor(private readonly store: KVStore) {}

  async append(envelope: EventEnvelope): Promise<boolean> {
    const hash = envelope.hash;
    if (typeof hash !== 'string' || hash.length === 0) {
      throw new Error('Event envelope missing hash');
    }
    return this.appendEvent(hash, canonicalizeBytes(envelope));
  }

  async appendEvent(hash: string, eventBytes: Uint8Array): Promise<boolean> {
    validateEventBytes(hash, eventBytes);
    if (await this.store.get(`${PREFIX_LOG_HASH}${hash}`)) {
      return false;
    }
    const key = `${PREFIX_EVENT}${hash}`;
    const existing = await this.store.get(key);
    if (existing && !bytesEqual(existing, eventBytes)) {
      throw new Error('Event immutability violation');
    }
    if (!existing) {
      await this.store.put(key, eventBytes);
    }
    const seq = await this.getLogLength();
    await this.store.put(`${PREFIX_LOG_SEQ}${encodeSeq(seq)}`, utf8ToBytes(hash));
    await this.store.put(`${PREFIX_LOG_HASH}${hash}`, utf8ToBytes(encodeSeq(seq)));
    await this.store.put(KEY_LOG_SEQ, utf8ToBytes(String(seq + 1)));
    return true;
  }

  async getEvent(hash: string): Promise<Uint8Array | undefined> {
    return this.store.get(`${PREFIX_EVENT}${hash}`);
  }

  async getLogLength(): Promise<number> {
    const raw = await this.store.get(KEY_LOG_SEQ);
    return raw ? Number.parseInt(bytesToUtf8(raw), 10) : 0;
  }

  async getLatestEventHash(): Promise<string | null> {
    const length = await this.getLogLength();
    if (length === 0) {
      return null;
    }
    const value = await this.store.get(`${PREFIX_LOG_SEQ}${encodeSeq(length - 1)}`);
    return value ? bytesToUtf8(value) : null;
  }

  /**
   * Up to `limit` events logged after the `from` hash. An unknown or empty
   * cursor starts from the beginning.
   */
  async getEventLogRange(
    from: string | null,
    limit: number,
  ): Promise<{ events: Uint8Array[]; cursor: string }> {
    if (limit <= 0) {
      return { events: [], cursor: '' };
    }
    let startSeq = 0;
    if (from) {
      const seqBytes = await this.store.get(`${PREFIX_LOG_HASH}${from}`);
      if (seqBytes) {
        startSeq = decodeSeq(bytesToUtf8(seqBytes)) + 1;
      }
    }

    const events: Uint8Array[] = [];
    let cursor = '';
    for await (const { key, value } of this.store.iterator(PREFIX_LOG_SEQ)) {
      if (decodeSeq(key.slice(PREFIX_LOG_SEQ.length)) < startSeq) {
        continue;
      }
      const hash = bytesToUtf8(value);
      const eventBytes = await this.getEvent(hash);
      if (!eventBytes) {
        continue;
      }
      events.push(eventBytes);
      cursor = hash;
      if (events.length >= limit) {
        break;
      }
    }
    return { events, cursor };
  }

  async readEnvelopes(): Promise<EventEnvelope[]> {
    const envelopes: EventEnvelope[] = [];
    for await (const { value } of this.store.iterator(PREFIX_LOG_SEQ)) {
      const eventBytes = await this.getEvent(bytesToUtf8(value));
      if (eventBytes) {
        envelopes.push(parseEnvelopeBytes(eventBytes));
      }
    }
    return envelopes;
  }

  /** Re-checks hash, canonical form and signature of every logged event. */
  async verifyEventLog(): Promise<{ ok: boolean; errors: string[] }> {
    const errors: string[] = [];
    for await (const { value } of this.store.iterator(PREFIX_LOG_SEQ)) {
      const hash = bytesToUtf8(value);
      const eventBytes = await this.getEvent(hash);
      if (!eventBytes) {
        errors.push(`missing event bytes for ${hash}`);
        continue;
      }
      try {
        const envelope = validateEventBytes(hash, eventBytes);
        if (!(await verifyEnvelope(envelope))) {
          errors.push(`${hash}: invalid signature`);
        }
      } catch (error) {
        errors.push(`${hash}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    return { ok: errors.length === 0, errors };
  }
}
