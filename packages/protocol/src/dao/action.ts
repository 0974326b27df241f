/**
 * DAO Governance: Extracted Actions
 *
 * Executing a proposal hands out its payload wrapped in an ExtractedAction
 * tagged with the DAO and proposal it came from. The payload can be taken
 * out once; executors check the tags, consume it and apply it.
 */

import { DaoError } from './errors.js';
import type {
  ActionPayload,
  ConfigUpdateAction,
  TreasurySpendAction,
} from './types.js';

export class ExtractedAction<A extends ActionPayload> {
  private consumed = false;

  constructor(
    public readonly daoId: string,
    public readonly proposalId: string,
    private readonly payload: A,
  ) {}

  get type(): string {
    return this.payload.type;
  }

  get isConsumed(): boolean {
    return this.consumed;
  }

  consume(): A {
    if (this.consumed) {
      throw new DaoError(
        'ACTION_ALREADY_CONSUMED',
        `action from proposal ${this.proposalId} was already applied`,
      );
    }
    this.consumed = true;
    return this.payload;
  }
}

export interface ActionExecutor {
  /** Payload type this executor applies. */
  readonly type: string;
  apply(action: ExtractedAction<ActionPayload>): void;
}

export function isConfigUpdateAction(payload: ActionPayload): payload is ConfigUpdateAction {
  return payload.type === 'config_update' && 'update' in payload;
}

export function isTreasurySpendAction(payload: ActionPayload): payload is TreasurySpendAction {
  return (
    payload.type === 'treasury_spend' &&
    'recipient' in payload &&
    'amount' in payload &&
    typeof payload.amount === 'bigint'
  );
}

export function assertActionFor(
  action: ExtractedAction<ActionPayload>,
  daoId: string,
  type: string,
): void {
  if (action.daoId !== daoId) {
    throw new DaoError(
      'DAO_MISMATCH',
      `action from dao ${action.daoId} cannot be applied to dao ${daoId}`,
    );
  }
  if (action.type !== type) {
    throw new DaoError('ACTION_TYPE_MISMATCH', `expected ${type} action, got ${action.type}`);
  }
}

// ---------------------------------------------------------------------------
// Treasury
// ---------------------------------------------------------------------------

export interface TreasurySpend {
  proposalId: string;
  recipient: string;
  amount: bigint;
  purpose: string;
}

export class MemoryTreasury {
  private balance = 0n;
  private readonly spends: TreasurySpend[] = [];

  constructor(public readonly daoId: string) {}

  deposit(amount: bigint): void {
    if (amount <= 0n) {
      throw new RangeError('amount must be > 0');
    }
    this.balance += amount;
  }

  getBalance(): bigint {
    return this.balance;
  }

  listSpends(): TreasurySpend[] {
    return [...this.spends];
  }

  spend(entry: TreasurySpend): void {
    if (entry.amount <= 0n) {
      throw new RangeError('amount must be > 0');
    }
    if (this.balance < entry.amount) {
      throw new DaoError(
        'INSUFFICIENT_BALANCE',
        `treasury holds ${this.balance}, spend needs ${entry.amount}`,
      );
    }
    this.balance -= entry.amount;
    this.spends.push({ ...entry });
  }
}

export function treasurySpendExecutor(treasury: MemoryTreasury): ActionExecutor {
  return {
    type: 'treasury_spend',
    apply(action) {
      assertActionFor(action, treasury.daoId, 'treasury_spend');
      const payload = action.consume();
      if (!isTreasurySpendAction(payload)) {
        throw new DaoError('ACTION_TYPE_MISMATCH', 'malformed treasury_spend payload');
      }
      treasury.spend({
        proposalId: action.proposalId,
        recipient: payload.recipient,
        amount: payload.amount,
        purpose: payload.purpose,
      });
    },
  };
}
