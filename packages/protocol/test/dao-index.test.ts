import { describe, expect, it } from 'vitest';
import {
  didFromPublicKey,
  EventLog,
  generateKeypair,
  MemoryStore,
  type EventEnvelope,
} from '@stakegov/core';
import {
  applyDaoEvent,
  configUpdate,
  configUpdateExecutor,
  createDaoIndexState,
  Governance,
  ManualClock,
  MemoryDaoStore,
  MemoryTokenCustody,
  parseDaoEvent,
  percentToRate,
  SignedEventSink,
  WitnessRegistry,
} from '../src/dao/index.js';

async function setup() {
  const keys = await generateKeypair();
  const issuer = didFromPublicKey(keys.publicKey);
  const log = new EventLog(new MemoryStore());
  const sink = new SignedEventSink({ issuer, privateKey: keys.privateKey, log });
  const clock = new ManualClock(0);
  const custody = new MemoryTokenCustody();
  for (const voter of ['alice', 'bob', 'carol']) {
    custody.deposit(voter, 1000n);
  }
  const registry = new WitnessRegistry();
  const dao = Governance.create(
    registry,
    registry.issue('GOV'),
    {
      votingDelay: 1000,
      votingPeriod: 5000,
      quorumRate: percentToRate(50),
      minActionDelay: 2000,
      minQuorumVotes: 100n,
    },
    { clock, custody, sink },
  );
  return { issuer, log, sink, clock, dao };
}

function rawEnvelope(type: string, payload: Record<string, unknown>): EventEnvelope {
  return { v: 1, type, issuer: 'did:stake:ftest', ts: 1, nonce: 1, payload };
}

describe('dao index replay', () => {
  it('rebuilds proposals and receipts from the signed log', async () => {
    const { log, sink, clock, dao } = await setup();

    dao.propose({
      proposer: 'alice',
      payload: { type: 'config_update', update: configUpdate({ votingPeriod: 8000 }) },
      actionDelay: 2000,
      quorumVotes: 100n,
    });
    clock.set(1500);
    const alice = dao.castVote({ proposalId: 'proposal-1', voter: 'alice', amount: 150n, side: 'for' });
    clock.set(2000);
    const bob = dao.castVote({ proposalId: 'proposal-1', voter: 'bob', amount: 40n, side: 'against' });
    clock.set(2500);
    dao.changeVote('proposal-1', bob);
    clock.set(3000);
    const carol = dao.castVote({ proposalId: 'proposal-1', voter: 'carol', amount: 30n, side: 'against' });
    clock.set(3500);
    dao.revokeVote('proposal-1', carol);

    const first = await sink.flush();
    expect(first).toHaveLength(7);

    clock.set(7000);
    dao.queue('proposal-1', 'bob');
    clock.set(9000);
    dao.executeWith('proposal-1', 'bob', configUpdateExecutor(dao));
    clock.set(9500);
    dao.unstakeVote('proposal-1', alice);

    expect(sink.pendingCount).toBe(4);
    const second = await sink.flush();
    expect(sink.pendingCount).toBe(0);

    const sealed = [...first, ...second];
    expect(sealed.map((envelope) => envelope.type)).toEqual([
      'dao.create',
      'dao.proposal.create',
      'dao.vote.cast',
      'dao.vote.cast',
      'dao.vote.change',
      'dao.vote.cast',
      'dao.vote.revoke',
      'dao.proposal.queue',
      'dao.proposal.execute',
      'dao.config.update',
      'dao.vote.unstake',
    ]);
    expect(sealed.map((envelope) => envelope.nonce)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
    expect('prev' in sealed[0]).toBe(false);
    for (let i = 1; i < sealed.length; i++) {
      expect(sealed[i].prev).toBe(sealed[i - 1].hash);
    }

    expect(await log.getLogLength()).toBe(11);
    expect(await log.verifyEventLog()).toEqual({ ok: true, errors: [] });

    const store = new MemoryDaoStore();
    await store.applyEvents(await log.readEnvelopes());

    const proposal = await store.getProposal('proposal-1');
    expect(proposal).toMatchObject({
      daoId: 'dao-1',
      proposer: 'alice',
      startTime: 1000,
      endTime: 6000,
      forVotes: '190',
      againstVotes: '0',
      eta: 9000,
      actionType: 'config_update',
      createdAt: 0,
      executedAt: 9000,
    });
    expect(BigInt(proposal?.forVotes ?? '0')).toBe(dao.getProposal('proposal-1')?.forVotes);
    expect(await store.getProposalState('proposal-1', 8000)).toBe('queued');
    expect(await store.getProposalState('proposal-1', 9500)).toBe('extracted');
    expect(await store.getProposalState('proposal-9', 9500)).toBeUndefined();

    const receipts = await store.getReceipts('proposal-1');
    expect(Object.fromEntries(receipts.map((r) => [r.id, r.status]))).toEqual({
      'receipt-1': 'unstaked',
      'receipt-2': 'live',
      'receipt-3': 'revoked',
    });
    expect((await store.getReceipts('proposal-1', 'live')).map((r) => r.side)).toEqual(['for']);

    const indexed = await store.getDao('dao-1');
    expect(indexed?.tokenType).toBe('GOV');
    expect(indexed?.config.votingPeriod).toBe(8000);
    expect(indexed?.updatedAt).toBe(9000);
    expect((await store.getState()).history).toHaveLength(11);
  });

  it('derives the same states as the engine before execution', async () => {
    const { sink, clock, dao } = await setup();
    dao.propose({
      proposer: 'alice',
      payload: { type: 'config_update', update: configUpdate({ votingDelay: 500 }) },
      actionDelay: 2000,
      quorumVotes: 100n,
    });
    clock.set(1500);
    dao.castVote({ proposalId: 'proposal-1', voter: 'alice', amount: 150n, side: 'for' });
    clock.set(7000);
    dao.queue('proposal-1', 'bob');

    const store = new MemoryDaoStore();
    await store.applyEvents(await sink.flush());

    expect(await store.getProposalState('proposal-1', 500)).toBe('pending');
    expect(await store.getProposalState('proposal-1', 3000)).toBe('active');
    expect(await store.getProposalState('proposal-1', 8999)).toBe('queued');
    expect(await store.getProposalState('proposal-1', 9000)).toBe('executable');
    clock.set(9000);
    expect(dao.state('proposal-1')).toBe('executable');
  });

  it('rejects a sink issuer that is not a did', () => {
    expect(() => new SignedEventSink({ issuer: 'alice', privateKey: new Uint8Array(32) })).toThrow(
      'issuer must be a valid did:stake identifier',
    );
  });
});

describe('dao index reducer', () => {
  it('ignores envelopes of other types', () => {
    const state = createDaoIndexState();
    expect(applyDaoEvent(state, rawEnvelope('wallet.transfer', {}))).toBe(state);
  });

  it('rejects votes on unknown proposals', () => {
    const envelope = rawEnvelope('dao.vote.cast', {
      daoId: 'dao-1',
      proposalId: 'proposal-1',
      receiptId: 'receipt-1',
      voter: 'alice',
      side: 'for',
      amount: '10',
    });
    expect(() => applyDaoEvent(createDaoIndexState(), envelope)).toThrow('proposal not found');
  });

  it('rejects a revoke of a receipt that is already closed', () => {
    let state = createDaoIndexState();
    state = applyDaoEvent(
      state,
      rawEnvelope('dao.create', {
        daoId: 'dao-1',
        tokenType: 'GOV',
        config: {
          votingDelay: 1000,
          votingPeriod: 5000,
          quorumRate: '500000000',
          minActionDelay: 2000,
          minQuorumVotes: '1',
        },
      }),
    );
    state = applyDaoEvent(
      state,
      rawEnvelope('dao.proposal.create', {
        daoId: 'dao-1',
        proposalId: 'proposal-1',
        proposer: 'alice',
        startTime: 1000,
        endTime: 6000,
        actionDelay: 2000,
        quorumVotes: '1',
        quorumRate: '500000000',
      }),
    );
    const vote = {
      daoId: 'dao-1',
      proposalId: 'proposal-1',
      receiptId: 'receipt-1',
      voter: 'alice',
      side: 'for',
      amount: '10',
    };
    state = applyDaoEvent(state, rawEnvelope('dao.vote.cast', vote));
    state = applyDaoEvent(state, rawEnvelope('dao.vote.revoke', vote));

    expect(state.proposals['proposal-1'].forVotes).toBe('0');
    expect(state.receipts['receipt-1'].status).toBe('revoked');
    expect(() => applyDaoEvent(state, rawEnvelope('dao.vote.revoke', vote))).toThrow(
      'receipt is revoked',
    );
  });
});

describe('parseDaoEvent', () => {
  it('names the offending field', () => {
    expect(() =>
      parseDaoEvent('dao.vote.cast', 1, {
        daoId: 'dao-1',
        proposalId: 'proposal-1',
        receiptId: 'receipt-1',
        voter: 'alice',
        side: 'for',
        amount: '-5',
      }),
    ).toThrow('amount must be an unsigned integer string');
    expect(() =>
      parseDaoEvent('dao.proposal.queue', 1, { daoId: 'dao-1', proposalId: 'proposal-1', eta: 9000 }),
    ).toThrow('actor is required');
    expect(() => parseDaoEvent('dao.vote.cast', 1, { side: 'abstain' })).toThrow('daoId is required');
    expect(() => parseDaoEvent('dao.unknown', 1, {})).toThrow('unknown dao event type dao.unknown');
  });

  it('normalizes amounts', () => {
    const event = parseDaoEvent('dao.vote.unstake', 7, {
      daoId: 'dao-1',
      proposalId: 'proposal-1',
      receiptId: 'receipt-1',
      voter: 'alice',
      amount: '007',
    });
    expect(event).toEqual({
      type: 'dao.vote.unstake',
      ts: 7,
      payload: {
        daoId: 'dao-1',
        proposalId: 'proposal-1',
        receiptId: 'receipt-1',
        voter: 'alice',
        amount: '7',
      },
    });
  });
});
