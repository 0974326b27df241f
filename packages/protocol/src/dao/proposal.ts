/**
 * DAO Governance: Proposal State Machine
 *
 * State is never stored. `proposalState` recomputes it from the clock, the
 * tallies, `eta` and whether the payload is still held, in this order:
 *
 *   now < startTime                          → pending
 *   now <= endTime                           → active
 *   quorum not met (see quorum.ts)           → defeated
 *   eta == 0                                 → agreed
 *   now < eta                                → queued
 *   payload present                          → executable
 *   otherwise                                → extracted
 *
 * The mutating helpers below change the proposal object in place; callers
 * serialize access to a given proposal.
 */

import type { DaoConfig, ActionPayload, Proposal, ProposalState, VoteSide } from './types.js';
import { DaoError } from './errors.js';
import { meetsQuorum } from './quorum.js';

export interface CreateProposalParams<A extends ActionPayload> {
  id: string;
  daoId: string;
  proposer: string;
  now: number;
  payload?: A;
  actionDelay: number;
  quorumVotes: bigint;
}

export function createProposal<A extends ActionPayload>(
  config: DaoConfig,
  params: CreateProposalParams<A>,
): Proposal<A> {
  if (!Number.isSafeInteger(params.actionDelay) || params.actionDelay < config.minActionDelay) {
    throw new DaoError(
      'ACTION_DELAY_TOO_SMALL',
      `actionDelay must be >= ${config.minActionDelay}`,
    );
  }
  if (params.quorumVotes < config.minQuorumVotes) {
    throw new DaoError(
      'MIN_QUORUM_VOTES_TOO_SMALL',
      `quorumVotes must be >= ${config.minQuorumVotes}`,
    );
  }

  const startTime = params.now + config.votingDelay;
  const proposal: Proposal<A> = {
    id: params.id,
    daoId: params.daoId,
    proposer: params.proposer,
    startTime,
    endTime: startTime + config.votingPeriod,
    forVotes: 0n,
    againstVotes: 0n,
    eta: 0,
    actionDelay: params.actionDelay,
    quorumVotes: params.quorumVotes,
    quorumRate: config.quorumRate,
  };
  if (params.payload !== undefined) {
    proposal.payload = params.payload;
  }
  return proposal;
}

export function proposalState<A extends ActionPayload>(
  proposal: Proposal<A>,
  now: number,
): ProposalState {
  if (now < proposal.startTime) return 'pending';
  if (now <= proposal.endTime) return 'active';
  if (
    !meetsQuorum(
      proposal.forVotes,
      proposal.againstVotes,
      proposal.quorumVotes,
      proposal.quorumRate,
    )
  ) {
    return 'defeated';
  }
  if (proposal.eta === 0) return 'agreed';
  if (now < proposal.eta) return 'queued';
  if (proposal.payload !== undefined) return 'executable';
  return 'extracted';
}

export function assertActive<A extends ActionPayload>(proposal: Proposal<A>, now: number): void {
  const state = proposalState(proposal, now);
  if (state !== 'active') {
    throw new DaoError('PROPOSAL_NOT_ACTIVE', `proposal ${proposal.id} is ${state}`);
  }
}

export function addVotes<A extends ActionPayload>(
  proposal: Proposal<A>,
  side: VoteSide,
  amount: bigint,
): void {
  if (side === 'for') {
    proposal.forVotes += amount;
  } else {
    proposal.againstVotes += amount;
  }
}

export function removeVotes<A extends ActionPayload>(
  proposal: Proposal<A>,
  side: VoteSide,
  amount: bigint,
): void {
  const current = side === 'for' ? proposal.forVotes : proposal.againstVotes;
  if (current < amount) {
    throw new RangeError(`${side} votes would be negative`);
  }
  if (side === 'for') {
    proposal.forVotes = current - amount;
  } else {
    proposal.againstVotes = current - amount;
  }
}

/** Move an agreed proposal into the timelock: eta = now + actionDelay. */
export function queueProposal<A extends ActionPayload>(proposal: Proposal<A>, now: number): number {
  const state = proposalState(proposal, now);
  if (state !== 'agreed') {
    throw new DaoError('PROPOSAL_NOT_PASSED', `proposal ${proposal.id} is ${state}`);
  }
  proposal.eta = now + proposal.actionDelay;
  return proposal.eta;
}

/**
 * Take the payload out of an executable proposal. Afterwards the proposal
 * reports `extracted` for good.
 */
export function extractPayload<A extends ActionPayload>(proposal: Proposal<A>, now: number): A {
  const state = proposalState(proposal, now);
  const payload = proposal.payload;
  if (state !== 'executable' || payload === undefined) {
    throw new DaoError('CANNOT_EXECUTE_PROPOSAL', `proposal ${proposal.id} is ${state}`);
  }
  if (now < proposal.endTime + proposal.actionDelay) {
    throw new DaoError(
      'TOO_EARLY_TO_EXECUTE',
      `proposal ${proposal.id} executes at ${proposal.endTime + proposal.actionDelay}`,
    );
  }
  delete proposal.payload;
  return payload;
}
