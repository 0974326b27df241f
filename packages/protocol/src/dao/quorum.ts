/**
 * DAO Governance: Quorum Math
 *
 * A proposal passes when, after voting closes:
 *   for > against
 *   for >= quorumVotes
 *   divDown(for, for + against) >= quorumRate
 */

import { QUORUM_RATE_SCALE } from './types.js';

/** numerator / denominator at QUORUM_RATE_SCALE, truncated toward zero. */
export function divDown(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new RangeError('division by zero');
  }
  if (numerator < 0n || denominator < 0n) {
    throw new RangeError('divDown operands must be unsigned');
  }
  return (numerator * QUORUM_RATE_SCALE) / denominator;
}

/** Fraction of cast votes that are "for"; null when nothing was cast. */
export function forRatio(forVotes: bigint, againstVotes: bigint): bigint | null {
  const total = forVotes + againstVotes;
  if (total === 0n) {
    return null;
  }
  return divDown(forVotes, total);
}

export function meetsQuorum(
  forVotes: bigint,
  againstVotes: bigint,
  quorumVotes: bigint,
  quorumRate: bigint,
): boolean {
  if (forVotes <= againstVotes) return false;
  if (forVotes < quorumVotes) return false;
  const ratio = forRatio(forVotes, againstVotes);
  return ratio !== null && ratio >= quorumRate;
}

/** Percent (0..100) to fixed point, e.g. percentToRate(50) = 500_000_000n. */
export function percentToRate(percent: number): bigint {
  if (!Number.isInteger(percent) || percent < 0 || percent > 100) {
    throw new RangeError('percent must be an integer in 0..100');
  }
  return (BigInt(percent) * QUORUM_RATE_SCALE) / 100n;
}
