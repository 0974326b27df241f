import { DaoError } from './errors.js';

/**
 * Moves stake between a holder's liquid balance and governance lock. Vote
 * receipts hold what `lock` took until `release` hands it back.
 */
export interface TokenCustody {
  lock(owner: string, amount: bigint): void;
  release(owner: string, amount: bigint): void;
}

export interface CustodyBalance {
  available: bigint;
  locked: bigint;
}

function assertUnsigned(amount: bigint, field: string): void {
  if (amount < 0n) {
    throw new RangeError(`${field} must be >= 0`);
  }
}

export class MemoryTokenCustody implements TokenCustody {
  private readonly balances = new Map<string, CustodyBalance>();

  deposit(owner: string, amount: bigint): void {
    assertUnsigned(amount, 'amount');
    const balance = this.balanceOf(owner);
    this.balances.set(owner, { ...balance, available: balance.available + amount });
  }

  balanceOf(owner: string): CustodyBalance {
    return this.balances.get(owner) ?? { available: 0n, locked: 0n };
  }

  lock(owner: string, amount: bigint): void {
    assertUnsigned(amount, 'amount');
    const balance = this.balanceOf(owner);
    if (balance.available < amount) {
      throw new DaoError(
        'INSUFFICIENT_BALANCE',
        `${owner} has ${balance.available} available, needs ${amount}`,
      );
    }
    this.balances.set(owner, {
      available: balance.available - amount,
      locked: balance.locked + amount,
    });
  }

  release(owner: string, amount: bigint): void {
    assertUnsigned(amount, 'amount');
    const balance = this.balanceOf(owner);
    if (balance.locked < amount) {
      throw new RangeError(`${owner} has only ${balance.locked} locked`);
    }
    this.balances.set(owner, {
      available: balance.available + amount,
      locked: balance.locked - amount,
    });
  }
}
