import { describe, expect, it } from 'vitest';
import { generateKeypair } from '../src/crypto/ed25519.js';
import { canonicalizeBytes } from '../src/crypto/jcs.js';
import { didFromPublicKey } from '../src/identity/did.js';
import { EventEnvelope, sealEnvelope } from '../src/protocol/event-hash.js';
import { EventLog } from '../src/storage/event-log.js';
import { MemoryStore } from '../src/storage/memory.js';

async function makeEnvelopes(count: number): Promise<EventEnvelope[]> {
  const keys = await generateKeypair();
  const issuer = didFromPublicKey(keys.publicKey);
  const envelopes: EventEnvelope[] = [];
  for (let i = 1; i <= count; i++) {
    envelopes.push(
      await sealEnvelope(
        { type: 'test.event', issuer, ts: 1000 * i, nonce: i, payload: { seq: i } },
        keys.privateKey,
      ),
    );
  }
  return envelopes;
}

function hashOf(envelope: EventEnvelope): string {
  return String(envelope.hash);
}

describe('event log', () => {
  it('appends events and returns ranges by cursor', async () => {
    const log = new EventLog(new MemoryStore());
    const [e1, e2, e3] = await makeEnvelopes(3);
    for (const envelope of [e1, e2, e3]) {
      expect(await log.append(envelope)).toBe(true);
    }

    const first = await log.getEventLogRange('', 2);
    expect(first.events).toEqual([canonicalizeBytes(e1), canonicalizeBytes(e2)]);
    expect(first.cursor).toBe(hashOf(e2));

    const next = await log.getEventLogRange(first.cursor, 2);
    expect(next.events).toEqual([canonicalizeBytes(e3)]);
    expect(next.cursor).toBe(hashOf(e3));

    expect(await log.getLogLength()).toBe(3);
    expect(await log.getLatestEventHash()).toBe(hashOf(e3));
  });

  it('starts from the beginning when the cursor is unknown', async () => {
    const log = new EventLog(new MemoryStore());
    const [e1] = await makeEnvelopes(1);
    await log.append(e1);
    const range = await log.getEventLogRange('missing', 1);
    expect(range.events.length).toBe(1);
    expect(range.cursor).toBe(hashOf(e1));
  });

  it('ignores duplicate appends', async () => {
    const log = new EventLog(new MemoryStore());
    const [e1] = await makeEnvelopes(1);
    expect(await log.append(e1)).toBe(true);
    expect(await log.append(e1)).toBe(false);
    expect(await log.getLogLength()).toBe(1);
  });

  it('rejects an envelope whose hash does not match', async () => {
    const log = new EventLog(new MemoryStore());
    const [e1] = await makeEnvelopes(1);
    await expect(log.append({ ...e1, nonce: 99 })).rejects.toThrow('Event hash mismatch');
  });

  it('reads envelopes back in log order', async () => {
    const log = new EventLog(new MemoryStore());
    const envelopes = await makeEnvelopes(12);
    for (const envelope of envelopes) {
      await log.append(envelope);
    }
    const read = await log.readEnvelopes();
    expect(read.map((envelope) => envelope.nonce)).toEqual(
      Array.from({ length: 12 }, (_, i) => i + 1),
    );
    expect(read[4]).toEqual(envelopes[4]);
  });

  it('verifies stored events and reports tampering', async () => {
    const store = new MemoryStore();
    const log = new EventLog(store);
    const [e1, e2] = await makeEnvelopes(2);
    await log.append(e1);
    await log.append(e2);
    expect(await log.verifyEventLog()).toEqual({ ok: true, errors: [] });

    const tampered = canonicalizeBytes({ ...e2, payload: { seq: 20 } });
    await store.put(`ev:${hashOf(e2)}`, tampered);
    expect(await log.verifyEventLog()).toEqual({
      ok: false,
      errors: [`${hashOf(e2)}: Event hash mismatch`],
    });
  });
});
