/**
 * DAO Governance: Index State & Reducer
 *
 * Rebuilds DAO, proposal and receipt history from notification envelopes
 * alone. Pure and deterministic: the same envelopes in the same order give
 * the same state.
 */

import type { GenesisConfig } from '@stakegov/core/storage';
import { EventEnvelope, eventHashHex } from '@stakegov/core/protocol';
import type { DaoEvent } from './events.js';
import { isDaoEventType, parseDaoEvent } from './events.js';
import type { ActionPayload, Proposal, ProposalState, VoteSide } from './types.js';
import { proposalState } from './proposal.js';

// ---------------------------------------------------------------------------
// Index State
// ---------------------------------------------------------------------------

export interface IndexedDao {
  daoId: string;
  tokenType: string;
  config: GenesisConfig;
  createdAt: number;
  updatedAt: number;
}

export interface IndexedProposal {
  id: string;
  daoId: string;
  proposer: string;
  startTime: number;
  endTime: number;
  forVotes: string; // bigint as string
  againstVotes: string;
  eta: number;
  actionDelay: number;
  quorumVotes: string;
  quorumRate: string;
  actionType?: string;
  createdAt: number;
  executedAt?: number;
}

export type ReceiptStatus = 'live' | 'revoked' | 'unstaked';

export interface IndexedReceipt {
  id: string;
  daoId: string;
  proposalId: string;
  voter: string;
  side: VoteSide;
  amount: string;
  status: ReceiptStatus;
  castAt: number;
  closedAt?: number;
}

export interface DaoIndexHistoryEntry {
  hash: string;
  type: string;
  ts: number;
  payload: Record<string, unknown>;
}

export interface DaoIndexState {
  daos: Record<string, IndexedDao>;
  proposals: Record<string, IndexedProposal>;
  receipts: Record<string, IndexedReceipt>;
  history: DaoIndexHistoryEntry[];
}

export function createDaoIndexState(): DaoIndexState {
  return {
    daos: {},
    proposals: {},
    receipts: {},
    history: [],
  };
}

function cloneState(state: DaoIndexState): DaoIndexState {
  return {
    daos: { ...state.daos },
    proposals: { ...state.proposals },
    receipts: { ...state.receipts },
    history: [...state.history],
  };
}

function addAmount(current: string, delta: bigint, field: string): string {
  const next = BigInt(current) + delta;
  if (next < 0n) {
    throw new Error(`${field} would be negative`);
  }
  return next.toString();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Reducer
// ---------------------------------------------------------------------------

export function applyDaoEvent(state: DaoIndexState, envelope: EventEnvelope): DaoIndexState {
  const type = String(envelope.type ?? '');
  if (!isDaoEventType(type)) {
    return state;
  }

  const payload = isRecord(envelope.payload) ? envelope.payload : {};
  const ts = typeof envelope.ts === 'number' ? envelope.ts : 0;
  const hash =
    typeof envelope.hash === 'string' && envelope.hash.length
      ? envelope.hash
      : eventHashHex(envelope);
  const event = parseDaoEvent(type, ts, payload);

  const next = cloneState(state);
  applyEvent(next, event);
  next.history.push({ hash, type, ts, payload });
  return next;
}

function applyEvent(state: DaoIndexState, event: DaoEvent): void {
  switch (event.type) {
    case 'dao.create': {
      const { daoId, tokenType, config } = event.payload;
      if (state.daos[daoId]) {
        throw new Error('dao already exists');
      }
      state.daos[daoId] = {
        daoId,
        tokenType,
        config,
        createdAt: event.ts,
        updatedAt: event.ts,
      };
      break;
    }
    case 'dao.proposal.create': {
      const payload = event.payload;
      requireDao(state, payload.daoId);
      if (state.proposals[payload.proposalId]) {
        throw new Error('proposal already exists');
      }
      state.proposals[payload.proposalId] = {
        id: payload.proposalId,
        daoId: payload.daoId,
        proposer: payload.proposer,
        startTime: payload.startTime,
        endTime: payload.endTime,
        forVotes: '0',
        againstVotes: '0',
        eta: 0,
        actionDelay: payload.actionDelay,
        quorumVotes: payload.quorumVotes,
        quorumRate: payload.quorumRate,
        ...(payload.actionType !== undefined ? { actionType: payload.actionType } : {}),
        createdAt: event.ts,
      };
      break;
    }
    case 'dao.vote.cast': {
      const payload = event.payload;
      const proposal = requireProposal(state, payload.proposalId);
      if (state.receipts[payload.receiptId]) {
        throw new Error('receipt already exists');
      }
      state.proposals[proposal.id] = adjustTally(proposal, payload.side, BigInt(payload.amount));
      state.receipts[payload.receiptId] = {
        id: payload.receiptId,
        daoId: payload.daoId,
        proposalId: payload.proposalId,
        voter: payload.voter,
        side: payload.side,
        amount: payload.amount,
        status: 'live',
        castAt: event.ts,
      };
      break;
    }
    case 'dao.vote.change': {
      const payload = event.payload;
      const proposal = requireProposal(state, payload.proposalId);
      const receipt = requireLiveReceipt(state, payload.receiptId);
      if (receipt.side === payload.side) {
        throw new Error('vote change must flip side');
      }
      const amount = BigInt(receipt.amount);
      const moved = adjustTally(proposal, receipt.side, -amount);
      state.proposals[proposal.id] = adjustTally(moved, payload.side, amount);
      state.receipts[receipt.id] = { ...receipt, side: payload.side };
      break;
    }
    case 'dao.vote.revoke': {
      const payload = event.payload;
      const proposal = requireProposal(state, payload.proposalId);
      const receipt = requireLiveReceipt(state, payload.receiptId);
      state.proposals[proposal.id] = adjustTally(proposal, receipt.side, -BigInt(receipt.amount));
      state.receipts[receipt.id] = { ...receipt, status: 'revoked', closedAt: event.ts };
      break;
    }
    case 'dao.vote.unstake': {
      const receipt = requireLiveReceipt(state, event.payload.receiptId);
      state.receipts[receipt.id] = { ...receipt, status: 'unstaked', closedAt: event.ts };
      break;
    }
    case 'dao.proposal.queue': {
      const proposal = requireProposal(state, event.payload.proposalId);
      if (proposal.eta !== 0) {
        throw new Error('proposal already queued');
      }
      state.proposals[proposal.id] = { ...proposal, eta: event.payload.eta };
      break;
    }
    case 'dao.proposal.execute': {
      const proposal = requireProposal(state, event.payload.proposalId);
      if (proposal.executedAt !== undefined) {
        throw new Error('proposal already executed');
      }
      state.proposals[proposal.id] = { ...proposal, executedAt: event.ts };
      break;
    }
    case 'dao.config.update': {
      const dao = requireDao(state, event.payload.daoId);
      state.daos[dao.daoId] = { ...dao, config: event.payload.config, updatedAt: event.ts };
      break;
    }
  }
}

function requireDao(state: DaoIndexState, daoId: string): IndexedDao {
  const dao = state.daos[daoId];
  if (!dao) {
    throw new Error('dao not found');
  }
  return dao;
}

function requireProposal(state: DaoIndexState, proposalId: string): IndexedProposal {
  const proposal = state.proposals[proposalId];
  if (!proposal) {
    throw new Error('proposal not found');
  }
  return proposal;
}

function requireLiveReceipt(state: DaoIndexState, receiptId: string): IndexedReceipt {
  const receipt = state.receipts[receiptId];
  if (!receipt) {
    throw new Error('receipt not found');
  }
  if (receipt.status !== 'live') {
    throw new Error(`receipt is ${receipt.status}`);
  }
  return receipt;
}

function adjustTally(proposal: IndexedProposal, side: VoteSide, delta: bigint): IndexedProposal {
  if (side === 'for') {
    return { ...proposal, forVotes: addAmount(proposal.forVotes, delta, 'forVotes') };
  }
  return { ...proposal, againstVotes: addAmount(proposal.againstVotes, delta, 'againstVotes') };
}

// ---------------------------------------------------------------------------
// Query helpers
// ---------------------------------------------------------------------------

export function getIndexedDao(state: DaoIndexState, daoId: string): IndexedDao | undefined {
  return state.daos[daoId];
}

export function getIndexedProposal(
  state: DaoIndexState,
  proposalId: string,
): IndexedProposal | undefined {
  return state.proposals[proposalId];
}

export function listIndexedProposals(state: DaoIndexState, daoId?: string): IndexedProposal[] {
  const all = Object.values(state.proposals);
  if (!daoId) return all;
  return all.filter((p) => p.daoId === daoId);
}

export function getProposalReceipts(
  state: DaoIndexState,
  proposalId: string,
  status?: ReceiptStatus,
): IndexedReceipt[] {
  return Object.values(state.receipts).filter(
    (r) => r.proposalId === proposalId && (status === undefined || r.status === status),
  );
}

/**
 * Lifecycle state of an indexed proposal at `now`, derived by the same
 * rules the engine uses. An action-bearing proposal still holds its
 * payload until an execute event is seen.
 */
export function indexedProposalState(record: IndexedProposal, now: number): ProposalState {
  const view: Proposal<ActionPayload> = {
    id: record.id,
    daoId: record.daoId,
    proposer: record.proposer,
    startTime: record.startTime,
    endTime: record.endTime,
    forVotes: BigInt(record.forVotes),
    againstVotes: BigInt(record.againstVotes),
    eta: record.eta,
    actionDelay: record.actionDelay,
    quorumVotes: BigInt(record.quorumVotes),
    quorumRate: BigInt(record.quorumRate),
  };
  if (record.actionType !== undefined && record.executedAt === undefined) {
    view.payload = { type: record.actionType };
  }
  return proposalState(view, now);
}
