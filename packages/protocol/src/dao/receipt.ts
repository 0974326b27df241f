/**
 * DAO Governance: Vote Receipts
 *
 * A receipt owns the stake it was cast with. While the proposal is active
 * the holder may flip its side or revoke it (tallies follow); once voting
 * has closed the stake comes back through `unstakeVote`, which leaves the
 * tallies as the historical result.
 */

import type { ActionPayload, Proposal, VoteReceipt, VoteSide } from './types.js';
import { oppositeSide, stateRank } from './types.js';
import { DaoError } from './errors.js';
import { addVotes, assertActive, proposalState, removeVotes } from './proposal.js';

export interface CastVoteParams {
  id: string;
  owner: string;
  amount: bigint;
  side: VoteSide;
  now: number;
}

function assertReceiptFor<A extends ActionPayload>(
  proposal: Proposal<A>,
  receipt: VoteReceipt,
): void {
  if (receipt.daoId !== proposal.daoId) {
    throw new DaoError('DAO_MISMATCH', `receipt ${receipt.id} belongs to dao ${receipt.daoId}`);
  }
  if (receipt.proposalId !== proposal.id) {
    throw new DaoError(
      'RECEIPT_PROPOSAL_MISMATCH',
      `receipt ${receipt.id} is for proposal ${receipt.proposalId}, not ${proposal.id}`,
    );
  }
  if (receipt.closed) {
    throw new DaoError('RECEIPT_NOT_FOUND', `receipt ${receipt.id} was already closed`);
  }
}

/** Checks a vote could be cast now, before any stake moves. */
export function assertCastable<A extends ActionPayload>(
  proposal: Proposal<A>,
  amount: bigint,
  now: number,
): void {
  assertActive(proposal, now);
  if (amount <= 0n) {
    throw new DaoError('ZERO_STAKE_REJECTED', 'stake amount must be > 0');
  }
}

export function castVote<A extends ActionPayload>(
  proposal: Proposal<A>,
  params: CastVoteParams,
): VoteReceipt {
  assertCastable(proposal, params.amount, params.now);
  addVotes(proposal, params.side, params.amount);
  return {
    id: params.id,
    daoId: proposal.daoId,
    proposalId: proposal.id,
    owner: params.owner,
    stakedAmount: params.amount,
    side: params.side,
    endTime: proposal.endTime,
    closed: false,
  };
}

/** Flip the receipt to the other side; the staked amount moves with it. */
export function changeVote<A extends ActionPayload>(
  proposal: Proposal<A>,
  receipt: VoteReceipt,
  now: number,
): VoteSide {
  assertReceiptFor(proposal, receipt);
  assertActive(proposal, now);
  const next = oppositeSide(receipt.side);
  removeVotes(proposal, receipt.side, receipt.stakedAmount);
  addVotes(proposal, next, receipt.stakedAmount);
  receipt.side = next;
  return next;
}

/**
 * Withdraw the vote while voting is open. Returns the stake to release and
 * closes the receipt.
 */
export function revokeVote<A extends ActionPayload>(
  proposal: Proposal<A>,
  receipt: VoteReceipt,
  now: number,
): bigint {
  assertReceiptFor(proposal, receipt);
  assertActive(proposal, now);
  removeVotes(proposal, receipt.side, receipt.stakedAmount);
  receipt.closed = true;
  return receipt.stakedAmount;
}

/** Reclaim stake after voting has closed. Returns the stake and closes the receipt. */
export function unstakeVote<A extends ActionPayload>(
  proposal: Proposal<A>,
  receipt: VoteReceipt,
  now: number,
): bigint {
  assertReceiptFor(proposal, receipt);
  const state = proposalState(proposal, now);
  if (stateRank(state) <= stateRank('active')) {
    throw new DaoError('PROPOSAL_NOT_RESOLVED', `proposal ${proposal.id} is ${state}`);
  }
  receipt.closed = true;
  return receipt.stakedAmount;
}
