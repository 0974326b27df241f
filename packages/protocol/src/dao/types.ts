/**
 * DAO Governance: Domain Types
 *
 * Proposals carry their own snapshot of the DAO parameters at creation and
 * derive their lifecycle state from the clock and the vote tallies; nothing
 * here stores a status field.
 */

// ---------------------------------------------------------------------------
// Fixed point
// ---------------------------------------------------------------------------

/** Scale of `quorumRate`: 1e9 = 100%. */
export const QUORUM_RATE_SCALE = 1_000_000_000n;

// ---------------------------------------------------------------------------
// Proposal State
// ---------------------------------------------------------------------------

/** Lifecycle order; `defeated` and `agreed` share a rank. */
export const PROPOSAL_STATES = [
  'pending',
  'active',
  'defeated',
  'agreed',
  'queued',
  'executable',
  'extracted',
] as const;

export type ProposalState = (typeof PROPOSAL_STATES)[number];

export function isProposalState(value: string): value is ProposalState {
  return (PROPOSAL_STATES as readonly string[]).includes(value);
}

const STATE_RANK: Record<ProposalState, number> = {
  pending: 0,
  active: 1,
  defeated: 2,
  agreed: 2,
  queued: 3,
  executable: 4,
  extracted: 5,
};

export function stateRank(state: ProposalState): number {
  return STATE_RANK[state];
}

// ---------------------------------------------------------------------------
// Vote Side
// ---------------------------------------------------------------------------

export const VOTE_SIDES = ['for', 'against'] as const;

export type VoteSide = (typeof VOTE_SIDES)[number];

export function isVoteSide(value: string): value is VoteSide {
  return (VOTE_SIDES as readonly string[]).includes(value);
}

export function oppositeSide(side: VoteSide): VoteSide {
  return side === 'for' ? 'against' : 'for';
}

// ---------------------------------------------------------------------------
// Optional override
// ---------------------------------------------------------------------------

export type Option<T> = { some: true; value: T } | { some: false };

export function some<T>(value: T): Option<T> {
  return { some: true, value };
}

export function none<T>(): Option<T> {
  return { some: false };
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface DaoConfig {
  /** ms between proposal creation and the start of voting */
  votingDelay: number;
  /** ms the voting window stays open */
  votingPeriod: number;
  /** required for / (for + against), scaled by QUORUM_RATE_SCALE */
  quorumRate: bigint;
  /** smallest action delay a proposal may request (ms) */
  minActionDelay: number;
  /** smallest absolute for-weight a proposal may require */
  minQuorumVotes: bigint;
}

export interface ConfigUpdate {
  votingDelay: Option<number>;
  votingPeriod: Option<number>;
  quorumRate: Option<bigint>;
  minActionDelay: Option<number>;
  minQuorumVotes: Option<bigint>;
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export interface ActionPayload {
  type: string;
}

export interface ConfigUpdateAction extends ActionPayload {
  type: 'config_update';
  update: ConfigUpdate;
}

export interface TreasurySpendAction extends ActionPayload {
  type: 'treasury_spend';
  recipient: string;
  amount: bigint;
  purpose: string;
}

export type DaoAction = ConfigUpdateAction | TreasurySpendAction;

// ---------------------------------------------------------------------------
// Proposal
// ---------------------------------------------------------------------------

export interface Proposal<A extends ActionPayload = DaoAction> {
  id: string;
  daoId: string;
  proposer: string;
  startTime: number;
  endTime: number;
  forVotes: bigint;
  againstVotes: bigint;
  /** 0 until queued */
  eta: number;
  actionDelay: number;
  quorumVotes: bigint;
  quorumRate: bigint;
  /** cleared when the proposal is executed */
  payload?: A;
}

// ---------------------------------------------------------------------------
// Vote Receipt
// ---------------------------------------------------------------------------

export interface VoteReceipt {
  id: string;
  daoId: string;
  proposalId: string;
  owner: string;
  stakedAmount: bigint;
  side: VoteSide;
  /** copied from the proposal at cast time */
  endTime: number;
  /** set once revoked or unstaked; a closed receipt is rejected */
  closed: boolean;
}
