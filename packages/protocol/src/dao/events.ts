/**
 * DAO Governance: Notifications
 *
 * Event types:
 *   dao.create             DAO created from its witness
 *   dao.proposal.create    Proposal created
 *   dao.vote.cast          Stake locked behind a new receipt
 *   dao.vote.change        Receipt flipped to the other side
 *   dao.vote.revoke        Receipt destroyed while voting was open
 *   dao.vote.unstake       Receipt destroyed after voting closed
 *   dao.proposal.queue     Agreed proposal queued, eta set
 *   dao.proposal.execute   Payload extracted
 *   dao.config.update      Configuration replaced by an executed update
 *
 * Payloads are JSON-safe (amounts as decimal strings) so they can be sealed
 * into signed envelopes and replayed by the indexer in state.ts.
 */

import type { GenesisConfig } from '@stakegov/core/storage';
import type { EventLog } from '@stakegov/core/storage';
import { EventEnvelope, sealEnvelope } from '@stakegov/core/protocol';
import { isValidDid } from '@stakegov/core/identity';
import type { VoteSide } from './types.js';
import { isVoteSide } from './types.js';

// ---------------------------------------------------------------------------
// Payloads
// ---------------------------------------------------------------------------

export interface DaoCreatePayload extends Record<string, unknown> {
  daoId: string;
  tokenType: string;
  config: GenesisConfig;
}

export interface DaoProposalCreatePayload extends Record<string, unknown> {
  daoId: string;
  proposalId: string;
  proposer: string;
  startTime: number;
  endTime: number;
  actionDelay: number;
  quorumVotes: string;
  quorumRate: string;
  actionType?: string;
}

export interface DaoVoteCastPayload extends Record<string, unknown> {
  daoId: string;
  proposalId: string;
  receiptId: string;
  voter: string;
  side: VoteSide;
  amount: string;
}

/** `side` is the side after the change. */
export type DaoVoteChangePayload = DaoVoteCastPayload;

export type DaoVoteRevokePayload = DaoVoteCastPayload;

export interface DaoVoteUnstakePayload extends Record<string, unknown> {
  daoId: string;
  proposalId: string;
  receiptId: string;
  voter: string;
  amount: string;
}

export interface DaoProposalQueuePayload extends Record<string, unknown> {
  daoId: string;
  proposalId: string;
  actor: string;
  eta: number;
}

export interface DaoProposalExecutePayload extends Record<string, unknown> {
  daoId: string;
  proposalId: string;
  actor: string;
  actionType: string;
}

export interface DaoConfigUpdatePayload extends Record<string, unknown> {
  daoId: string;
  proposalId: string;
  config: GenesisConfig;
}

export type DaoEvent =
  | { type: 'dao.create'; ts: number; payload: DaoCreatePayload }
  | { type: 'dao.proposal.create'; ts: number; payload: DaoProposalCreatePayload }
  | { type: 'dao.vote.cast'; ts: number; payload: DaoVoteCastPayload }
  | { type: 'dao.vote.change'; ts: number; payload: DaoVoteChangePayload }
  | { type: 'dao.vote.revoke'; ts: number; payload: DaoVoteRevokePayload }
  | { type: 'dao.vote.unstake'; ts: number; payload: DaoVoteUnstakePayload }
  | { type: 'dao.proposal.queue'; ts: number; payload: DaoProposalQueuePayload }
  | { type: 'dao.proposal.execute'; ts: number; payload: DaoProposalExecutePayload }
  | { type: 'dao.config.update'; ts: number; payload: DaoConfigUpdatePayload };

export type DaoEventType = DaoEvent['type'];

export const DAO_EVENT_TYPES: readonly DaoEventType[] = [
  'dao.create',
  'dao.proposal.create',
  'dao.vote.cast',
  'dao.vote.change',
  'dao.vote.revoke',
  'dao.vote.unstake',
  'dao.proposal.queue',
  'dao.proposal.execute',
  'dao.config.update',
];

export function isDaoEventType(value: string): value is DaoEventType {
  return (DAO_EVENT_TYPES as readonly string[]).includes(value);
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireNonEmpty(raw: Record<string, unknown>, field: string): string {
  const value = raw[field];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new Error(`${field} is required`);
  }
  return value;
}

function requireTimestamp(raw: Record<string, unknown>, field: string): number {
  const value = raw[field];
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new Error(`${field} must be a non-negative integer`);
  }
  return value;
}

function requireAmount(raw: Record<string, unknown>, field: string): string {
  const value = raw[field];
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new Error(`${field} must be an unsigned integer string`);
  }
  return BigInt(value).toString();
}

function requireSide(raw: Record<string, unknown>): VoteSide {
  const value = String(raw.side ?? '');
  if (!isVoteSide(value)) {
    throw new Error('side must be for or against');
  }
  return value;
}

function parseGenesis(raw: unknown, field: string): GenesisConfig {
  if (!isRecord(raw)) {
    throw new Error(`${field} must be an object`);
  }
  return {
    votingDelay: requireTimestamp(raw, 'votingDelay'),
    votingPeriod: requireTimestamp(raw, 'votingPeriod'),
    quorumRate: requireAmount(raw, 'quorumRate'),
    minActionDelay: requireTimestamp(raw, 'minActionDelay'),
    minQuorumVotes: requireAmount(raw, 'minQuorumVotes'),
  };
}

function parseVotePayload(raw: Record<string, unknown>): DaoVoteCastPayload {
  return {
    daoId: requireNonEmpty(raw, 'daoId'),
    proposalId: requireNonEmpty(raw, 'proposalId'),
    receiptId: requireNonEmpty(raw, 'receiptId'),
    voter: requireNonEmpty(raw, 'voter'),
    side: requireSide(raw),
    amount: requireAmount(raw, 'amount'),
  };
}

/**
 * Validate an untyped payload against the shape of its event type.
 * Throws with the offending field name.
 */
export function parseDaoEvent(type: string, ts: number, raw: Record<string, unknown>): DaoEvent {
  switch (type) {
    case 'dao.create':
      return {
        type: 'dao.create',
        ts,
        payload: {
          daoId: requireNonEmpty(raw, 'daoId'),
          tokenType: requireNonEmpty(raw, 'tokenType'),
          config: parseGenesis(raw.config, 'config'),
        },
      };
    case 'dao.proposal.create': {
      const actionType =
        raw.actionType !== undefined && raw.actionType !== null
          ? requireNonEmpty(raw, 'actionType')
          : undefined;
      return {
        type: 'dao.proposal.create',
        ts,
        payload: {
          daoId: requireNonEmpty(raw, 'daoId'),
          proposalId: requireNonEmpty(raw, 'proposalId'),
          proposer: requireNonEmpty(raw, 'proposer'),
          startTime: requireTimestamp(raw, 'startTime'),
          endTime: requireTimestamp(raw, 'endTime'),
          actionDelay: requireTimestamp(raw, 'actionDelay'),
          quorumVotes: requireAmount(raw, 'quorumVotes'),
          quorumRate: requireAmount(raw, 'quorumRate'),
          ...(actionType !== undefined ? { actionType } : {}),
        },
      };
    }
    case 'dao.vote.cast':
      return { type: 'dao.vote.cast', ts, payload: parseVotePayload(raw) };
    case 'dao.vote.change':
      return { type: 'dao.vote.change', ts, payload: parseVotePayload(raw) };
    case 'dao.vote.revoke':
      return { type: 'dao.vote.revoke', ts, payload: parseVotePayload(raw) };
    case 'dao.vote.unstake':
      return {
        type: 'dao.vote.unstake',
        ts,
        payload: {
          daoId: requireNonEmpty(raw, 'daoId'),
          proposalId: requireNonEmpty(raw, 'proposalId'),
          receiptId: requireNonEmpty(raw, 'receiptId'),
          voter: requireNonEmpty(raw, 'voter'),
          amount: requireAmount(raw, 'amount'),
        },
      };
    case 'dao.proposal.queue':
      return {
        type: 'dao.proposal.queue',
        ts,
        payload: {
          daoId: requireNonEmpty(raw, 'daoId'),
          proposalId: requireNonEmpty(raw, 'proposalId'),
          actor: requireNonEmpty(raw, 'actor'),
          eta: requireTimestamp(raw, 'eta'),
        },
      };
    case 'dao.proposal.execute':
      return {
        type: 'dao.proposal.execute',
        ts,
        payload: {
          daoId: requireNonEmpty(raw, 'daoId'),
          proposalId: requireNonEmpty(raw, 'proposalId'),
          actor: requireNonEmpty(raw, 'actor'),
          actionType: requireNonEmpty(raw, 'actionType'),
        },
      };
    case 'dao.config.update':
      return {
        type: 'dao.config.update',
        ts,
        payload: {
          daoId: requireNonEmpty(raw, 'daoId'),
          proposalId: requireNonEmpty(raw, 'proposalId'),
          config: parseGenesis(raw.config, 'config'),
        },
      };
    default:
      throw new Error(`unknown dao event type ${type}`);
  }
}

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

export interface DaoEventSink {
  emit(event: DaoEvent): void;
}

export const noopEventSink: DaoEventSink = {
  emit: () => undefined,
};

export class MemoryEventSink implements DaoEventSink {
  readonly events: DaoEvent[] = [];

  emit(event: DaoEvent): void {
    this.events.push(event);
  }

  ofType<T extends DaoEventType>(type: T): Extract<DaoEvent, { type: T }>[] {
    return this.events.filter((event): event is Extract<DaoEvent, { type: T }> => event.type === type);
  }

  clear(): void {
    this.events.length = 0;
  }
}

export interface SignedEventSinkOptions {
  issuer: string;
  privateKey: Uint8Array;
  log?: EventLog;
}

/**
 * Buffers notifications and, on `flush`, seals each into a signed envelope
 * chained to the previous one through `prev`, appending it to the log when
 * one is given. Operations stay synchronous; signing happens at flush.
 */
export class SignedEventSink implements DaoEventSink {
  private readonly pending: DaoEvent[] = [];
  private nonce = 0;
  private prev?: string;

  constructor(private readonly options: SignedEventSinkOptions) {
    if (!isValidDid(options.issuer)) {
      throw new Error('issuer must be a valid did:stake identifier');
    }
  }

  emit(event: DaoEvent): void {
    this.pending.push(event);
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  async flush(): Promise<EventEnvelope[]> {
    const sealed: EventEnvelope[] = [];
    while (this.pending.length > 0) {
      const [event] = this.pending;
      const envelope = await sealEnvelope(
        {
          type: event.type,
          issuer: this.options.issuer,
          ts: event.ts,
          nonce: this.nonce + 1,
          payload: event.payload,
          prev: this.prev,
        },
        this.options.privateKey,
      );
      if (this.options.log) {
        await this.options.log.append(envelope);
      }
      this.pending.shift();
      this.nonce += 1;
      this.prev = typeof envelope.hash === 'string' ? envelope.hash : undefined;
      sealed.push(envelope);
    }
    return sealed;
  }
}
