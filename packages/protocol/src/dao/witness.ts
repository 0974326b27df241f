import { DaoError } from './errors.js';

/** One-time proof that the holder may create the DAO for `tokenType`. */
export interface DaoWitness {
  readonly tokenType: string;
}

/**
 * Issues at most one witness per governance token type and accepts each
 * witness once, so no second DAO can claim a token type already governed.
 */
export class WitnessRegistry {
  private readonly issued = new WeakSet<DaoWitness>();
  private readonly tokenTypes = new Set<string>();
  private readonly consumed = new Set<string>();

  issue(tokenType: string): DaoWitness {
    if (!tokenType.trim()) {
      throw new Error('tokenType is required');
    }
    if (this.tokenTypes.has(tokenType)) {
      throw new DaoError('DUPLICATE_DAO_WITNESS', `witness for ${tokenType} already issued`);
    }
    const witness: DaoWitness = Object.freeze({ tokenType });
    this.tokenTypes.add(tokenType);
    this.issued.add(witness);
    return witness;
  }

  consume(witness: DaoWitness): void {
    if (!this.issued.has(witness)) {
      throw new DaoError(
        'DUPLICATE_DAO_WITNESS',
        `witness for ${witness.tokenType} was not issued by this registry`,
      );
    }
    if (this.consumed.has(witness.tokenType)) {
      throw new DaoError('DUPLICATE_DAO_WITNESS', `dao for ${witness.tokenType} already exists`);
    }
    this.consumed.add(witness.tokenType);
  }

  isClaimed(tokenType: string): boolean {
    return this.consumed.has(tokenType);
  }
}
