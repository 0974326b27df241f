/**
 * DAO Governance: Index Store
 *
 * Async view over the pure index reducer. A persistent store implements
 * the same interface.
 */

import { EventEnvelope } from '@stakegov/core/protocol';
import type { ProposalState } from './types.js';
import {
  applyDaoEvent,
  createDaoIndexState,
  DaoIndexState,
  getIndexedDao,
  getIndexedProposal,
  getProposalReceipts,
  IndexedDao,
  IndexedProposal,
  IndexedReceipt,
  indexedProposalState,
  listIndexedProposals,
  ReceiptStatus,
} from './state.js';

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface DaoStore {
  applyEvent(envelope: EventEnvelope): Promise<void>;
  applyEvents(envelopes: EventEnvelope[]): Promise<void>;
  getDao(daoId: string): Promise<IndexedDao | undefined>;
  getProposal(proposalId: string): Promise<IndexedProposal | undefined>;
  listProposals(daoId?: string): Promise<IndexedProposal[]>;
  getReceipts(proposalId: string, status?: ReceiptStatus): Promise<IndexedReceipt[]>;
  getProposalState(proposalId: string, now: number): Promise<ProposalState | undefined>;
  getState(): Promise<DaoIndexState>;
}

// ---------------------------------------------------------------------------
// Memory Implementation
// ---------------------------------------------------------------------------

export class MemoryDaoStore implements DaoStore {
  private state: DaoIndexState = createDaoIndexState();

  async applyEvent(envelope: EventEnvelope): Promise<void> {
    this.state = applyDaoEvent(this.state, envelope);
  }

  async applyEvents(envelopes: EventEnvelope[]): Promise<void> {
    for (const envelope of envelopes) {
      this.state = applyDaoEvent(this.state, envelope);
    }
  }

  async getDao(daoId: string): Promise<IndexedDao | undefined> {
    return getIndexedDao(this.state, daoId);
  }

  async getProposal(proposalId: string): Promise<IndexedProposal | undefined> {
    return getIndexedProposal(this.state, proposalId);
  }

  async listProposals(daoId?: string): Promise<IndexedProposal[]> {
    return listIndexedProposals(this.state, daoId);
  }

  async getReceipts(proposalId: string, status?: ReceiptStatus): Promise<IndexedReceipt[]> {
    return getProposalReceipts(this.state, proposalId, status);
  }

  async getProposalState(proposalId: string, now: number): Promise<ProposalState | undefined> {
    const record = getIndexedProposal(this.state, proposalId);
    return record ? indexedProposalState(record, now) : undefined;
  }

  async getState(): Promise<DaoIndexState> {
    return this.state;
  }
}
