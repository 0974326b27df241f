/**
 * DAO Governance: Facade
 *
 * One Governance instance per DAO. It owns the configuration, the proposals
 * and the live vote receipts, locks and releases stake through the token
 * custody, and reports every transition to the event sink. All operations
 * are synchronous and validate before they mutate.
 */

import { createLogger, Logger } from '@stakegov/core';
import type { Clock } from './clock.js';
import { systemClock } from './clock.js';
import { applyConfigUpdate, createDaoConfig, serializeDaoConfig } from './config.js';
import type { TokenCustody } from './custody.js';
import { DaoError } from './errors.js';
import { DaoEventSink, noopEventSink } from './events.js';
import type { IdGenerator } from './ids.js';
import { sequentialIds } from './ids.js';
import { ActionExecutor, assertActionFor, ExtractedAction, isConfigUpdateAction } from './action.js';
import { createProposal, extractPayload, proposalState, queueProposal } from './proposal.js';
import { assertCastable, castVote, changeVote, revokeVote, unstakeVote } from './receipt.js';
import type {
  ActionPayload,
  DaoAction,
  DaoConfig,
  Proposal,
  ProposalState,
  VoteReceipt,
  VoteSide,
} from './types.js';
import type { DaoWitness, WitnessRegistry } from './witness.js';

export interface GovernanceOptions {
  custody: TokenCustody;
  clock?: Clock;
  sink?: DaoEventSink;
  ids?: IdGenerator;
  logger?: Logger;
}

export interface ProposeParams<A extends ActionPayload> {
  proposer: string;
  payload?: A;
  actionDelay: number;
  quorumVotes: bigint;
}

export interface VoteParams {
  proposalId: string;
  voter: string;
  amount: bigint;
  side: VoteSide;
}

function copyProposal<A extends ActionPayload>(proposal: Proposal<A>): Proposal<A> {
  return { ...proposal };
}

function copyReceipt(receipt: VoteReceipt): VoteReceipt {
  return { ...receipt };
}

export class Governance<A extends ActionPayload = DaoAction> {
  private config: DaoConfig;
  private readonly proposals = new Map<string, Proposal<A>>();
  private readonly receipts = new Map<string, VoteReceipt>();
  private readonly custody: TokenCustody;
  private readonly clock: Clock;
  private readonly sink: DaoEventSink;
  private readonly ids: IdGenerator;
  private readonly logger: Logger;

  private constructor(
    public readonly id: string,
    public readonly tokenType: string,
    config: DaoConfig,
    options: GovernanceOptions,
    ids: IdGenerator,
  ) {
    this.config = config;
    this.custody = options.custody;
    this.clock = options.clock ?? systemClock;
    this.sink = options.sink ?? noopEventSink;
    this.ids = ids;
    this.logger = options.logger ?? createLogger({ level: 'warn' });
  }

  /**
   * Create the DAO for the witness's token type. The witness is spent, so a
   * second DAO for the same token type cannot be created from it.
   */
  static create<A extends ActionPayload = DaoAction>(
    registry: WitnessRegistry,
    witness: DaoWitness,
    config: DaoConfig,
    options: GovernanceOptions,
  ): Governance<A> {
    const validated = createDaoConfig(config);
    registry.consume(witness);
    const ids = options.ids ?? sequentialIds();
    const dao = new Governance<A>(ids.next('dao'), witness.tokenType, validated, options, ids);
    dao.sink.emit({
      type: 'dao.create',
      ts: dao.clock.now(),
      payload: {
        daoId: dao.id,
        tokenType: dao.tokenType,
        config: serializeDaoConfig(validated),
      },
    });
    dao.logger.info('dao %s created for %s', dao.id, dao.tokenType);
    return dao;
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  getConfig(): DaoConfig {
    return { ...this.config };
  }

  getProposal(proposalId: string): Proposal<A> | undefined {
    const proposal = this.proposals.get(proposalId);
    return proposal ? copyProposal(proposal) : undefined;
  }

  listProposals(): Proposal<A>[] {
    return [...this.proposals.values()].map(copyProposal);
  }

  state(proposalId: string): ProposalState {
    return proposalState(this.requireProposal(proposalId), this.clock.now());
  }

  getReceipt(receiptId: string): VoteReceipt | undefined {
    const receipt = this.receipts.get(receiptId);
    return receipt ? copyReceipt(receipt) : undefined;
  }

  /** Receipts not yet revoked or unstaked for the proposal. */
  liveReceipts(proposalId: string): VoteReceipt[] {
    return [...this.receipts.values()]
      .filter((receipt) => receipt.proposalId === proposalId)
      .map(copyReceipt);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  propose(params: ProposeParams<A>): Proposal<A> {
    const now = this.clock.now();
    const proposal = createProposal(this.config, {
      id: this.ids.next('proposal'),
      daoId: this.id,
      proposer: params.proposer,
      now,
      payload: params.payload,
      actionDelay: params.actionDelay,
      quorumVotes: params.quorumVotes,
    });
    this.proposals.set(proposal.id, proposal);

    this.sink.emit({
      type: 'dao.proposal.create',
      ts: now,
      payload: {
        daoId: this.id,
        proposalId: proposal.id,
        proposer: proposal.proposer,
        startTime: proposal.startTime,
        endTime: proposal.endTime,
        actionDelay: proposal.actionDelay,
        quorumVotes: proposal.quorumVotes.toString(),
        quorumRate: proposal.quorumRate.toString(),
        ...(proposal.payload !== undefined ? { actionType: proposal.payload.type } : {}),
      },
    });
    this.logger.info(
      'proposal %s created by %s, voting %d..%d',
      proposal.id,
      proposal.proposer,
      proposal.startTime,
      proposal.endTime,
    );
    return copyProposal(proposal);
  }

  queue(proposalId: string, actor: string): number {
    const proposal = this.requireProposal(proposalId);
    const now = this.clock.now();
    const eta = queueProposal(proposal, now);
    this.sink.emit({
      type: 'dao.proposal.queue',
      ts: now,
      payload: { daoId: this.id, proposalId, actor, eta },
    });
    this.logger.info('proposal %s queued by %s, eta %d', proposalId, actor, eta);
    return eta;
  }

  /**
   * Extract the payload of an executable proposal. This is the unguarded
   * path: nothing notices if the returned action is never consumed, so
   * callers that hand it to an executor should use `executeWith`, which
   * fails with ACTION_NOT_CONSUMED in that case.
   */
  execute(proposalId: string, actor: string): ExtractedAction<A> {
    const proposal = this.requireProposal(proposalId);
    const now = this.clock.now();
    const payload = extractPayload(proposal, now);
    this.sink.emit({
      type: 'dao.proposal.execute',
      ts: now,
      payload: { daoId: this.id, proposalId, actor, actionType: payload.type },
    });
    this.logger.info('proposal %s executed by %s (%s)', proposalId, actor, payload.type);
    return new ExtractedAction(this.id, proposalId, payload);
  }

  /**
   * Execute and hand the action to `executor`. Fails before extraction when
   * the executor handles a different action type, and after it when the
   * executor returns without consuming the action.
   */
  executeWith(proposalId: string, actor: string, executor: ActionExecutor): void {
    const pending = this.requireProposal(proposalId).payload;
    if (pending !== undefined && pending.type !== executor.type) {
      throw new DaoError(
        'ACTION_TYPE_MISMATCH',
        `executor handles ${executor.type}, proposal carries ${pending.type}`,
      );
    }
    const action = this.execute(proposalId, actor);
    executor.apply(action);
    if (!action.isConsumed) {
      this.logger.error('action of proposal %s was dropped by its executor', proposalId);
      throw new DaoError(
        'ACTION_NOT_CONSUMED',
        `executor for ${action.type} did not apply the action of proposal ${proposalId}`,
      );
    }
  }

  /**
   * Apply a config_update action extracted from one of this DAO's proposals.
   * All overrides are validated together; on failure the configuration is
   * unchanged.
   */
  applyConfigUpdate(action: ExtractedAction<ActionPayload>): DaoConfig {
    assertActionFor(action, this.id, 'config_update');
    const payload = action.consume();
    if (!isConfigUpdateAction(payload)) {
      throw new DaoError('ACTION_TYPE_MISMATCH', 'malformed config_update payload');
    }
    const next = applyConfigUpdate(this.config, payload.update);
    this.config = next;
    this.sink.emit({
      type: 'dao.config.update',
      ts: this.clock.now(),
      payload: {
        daoId: this.id,
        proposalId: action.proposalId,
        config: serializeDaoConfig(next),
      },
    });
    this.logger.info('dao %s config updated by proposal %s', this.id, action.proposalId);
    return { ...next };
  }

  // -------------------------------------------------------------------------
  // Voting
  // -------------------------------------------------------------------------

  castVote(params: VoteParams): VoteReceipt {
    const proposal = this.requireProposal(params.proposalId);
    const now = this.clock.now();
    assertCastable(proposal, params.amount, now);
    this.custody.lock(params.voter, params.amount);
    const receipt = castVote(proposal, {
      id: this.ids.next('receipt'),
      owner: params.voter,
      amount: params.amount,
      side: params.side,
      now,
    });
    this.receipts.set(receipt.id, receipt);

    this.sink.emit({
      type: 'dao.vote.cast',
      ts: now,
      payload: {
        daoId: this.id,
        proposalId: proposal.id,
        receiptId: receipt.id,
        voter: receipt.owner,
        side: receipt.side,
        amount: receipt.stakedAmount.toString(),
      },
    });
    this.logger.debug(
      'vote %s on %s: %s %s',
      receipt.id,
      proposal.id,
      receipt.side,
      receipt.stakedAmount.toString(),
    );
    return copyReceipt(receipt);
  }

  changeVote(proposalId: string, receipt: VoteReceipt): VoteReceipt {
    const proposal = this.requireProposal(proposalId);
    const live = this.requireLiveReceipt(receipt);
    const now = this.clock.now();
    changeVote(proposal, live, now);

    this.sink.emit({
      type: 'dao.vote.change',
      ts: now,
      payload: {
        daoId: this.id,
        proposalId,
        receiptId: live.id,
        voter: live.owner,
        side: live.side,
        amount: live.stakedAmount.toString(),
      },
    });
    this.logger.debug('vote %s on %s changed to %s', live.id, proposalId, live.side);
    return copyReceipt(live);
  }

  /** Withdraw a vote while voting is open; returns the released stake. */
  revokeVote(proposalId: string, receipt: VoteReceipt): bigint {
    const proposal = this.requireProposal(proposalId);
    const live = this.requireLiveReceipt(receipt);
    const now = this.clock.now();
    const amount = revokeVote(proposal, live, now);
    this.receipts.delete(live.id);
    this.custody.release(live.owner, amount);

    this.sink.emit({
      type: 'dao.vote.revoke',
      ts: now,
      payload: {
        daoId: this.id,
        proposalId,
        receiptId: live.id,
        voter: live.owner,
        side: live.side,
        amount: amount.toString(),
      },
    });
    this.logger.debug('vote %s on %s revoked, %s released', live.id, proposalId, amount.toString());
    return amount;
  }

  /** Reclaim stake once voting has closed; tallies stay as they are. */
  unstakeVote(proposalId: string, receipt: VoteReceipt): bigint {
    const proposal = this.requireProposal(proposalId);
    const live = this.requireLiveReceipt(receipt);
    const now = this.clock.now();
    const amount = unstakeVote(proposal, live, now);
    this.receipts.delete(live.id);
    this.custody.release(live.owner, amount);

    this.sink.emit({
      type: 'dao.vote.unstake',
      ts: now,
      payload: {
        daoId: this.id,
        proposalId,
        receiptId: live.id,
        voter: live.owner,
        amount: amount.toString(),
      },
    });
    this.logger.debug('vote %s on %s unstaked, %s released', live.id, proposalId, amount.toString());
    return amount;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private requireProposal(proposalId: string): Proposal<A> {
    const proposal = this.proposals.get(proposalId);
    if (!proposal) {
      throw new DaoError('PROPOSAL_NOT_FOUND', `proposal ${proposalId} not found`);
    }
    return proposal;
  }

  private requireLiveReceipt(receipt: VoteReceipt): VoteReceipt {
    if (receipt.daoId !== this.id) {
      throw new DaoError('DAO_MISMATCH', `receipt ${receipt.id} belongs to dao ${receipt.daoId}`);
    }
    const live = this.receipts.get(receipt.id);
    if (!live) {
      throw new DaoError('RECEIPT_NOT_FOUND', `receipt ${receipt.id} is not live`);
    }
    return live;
  }
}

/** Executor that applies config_update actions to `governance`. */
export function configUpdateExecutor<A extends ActionPayload>(
  governance: Governance<A>,
): ActionExecutor {
  return {
    type: 'config_update',
    apply(action) {
      governance.applyConfigUpdate(action);
    },
  };
}
