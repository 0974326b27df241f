export const DAO_ERROR_CODES = [
  'INVALID_QUORUM_RATE',
  'ZERO_VOTING_DELAY',
  'ZERO_VOTING_PERIOD',
  'ZERO_MIN_ACTION_DELAY',
  'ZERO_MIN_QUORUM_VOTES',
  'ACTION_DELAY_TOO_SMALL',
  'MIN_QUORUM_VOTES_TOO_SMALL',
  'PROPOSAL_NOT_FOUND',
  'PROPOSAL_NOT_ACTIVE',
  'ZERO_STAKE_REJECTED',
  'RECEIPT_PROPOSAL_MISMATCH',
  'RECEIPT_NOT_FOUND',
  'PROPOSAL_NOT_RESOLVED',
  'PROPOSAL_NOT_PASSED',
  'CANNOT_EXECUTE_PROPOSAL',
  'TOO_EARLY_TO_EXECUTE',
  'DUPLICATE_DAO_WITNESS',
  'DAO_MISMATCH',
  'ACTION_TYPE_MISMATCH',
  'ACTION_ALREADY_CONSUMED',
  'ACTION_NOT_CONSUMED',
  'INSUFFICIENT_BALANCE',
] as const;

export type DaoErrorCode = (typeof DAO_ERROR_CODES)[number];

/** Precondition failure raised by a governance operation. */
export class DaoError extends Error {
  constructor(
    public readonly code: DaoErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'DaoError';
  }
}

export function isDaoError(error: unknown, code?: DaoErrorCode): error is DaoError {
  return error instanceof DaoError && (code === undefined || error.code === code);
}
