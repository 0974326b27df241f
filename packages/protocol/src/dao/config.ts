/**
 * DAO Governance: Configuration
 *
 * The DAO configuration changes only through an executed config_update
 * action. Overrides are substituted first and the full invariant set is
 * checked afterwards, so an update is accepted or rejected as one unit.
 */

import type { GenesisConfig } from '@stakegov/core/storage';
import { DaoError } from './errors.js';
import { none, some, QUORUM_RATE_SCALE } from './types.js';
import type { ConfigUpdate, DaoConfig, Option } from './types.js';

function isPositiveDuration(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

export function validateDaoConfig(config: DaoConfig): void {
  if (config.quorumRate <= 0n || config.quorumRate > QUORUM_RATE_SCALE) {
    throw new DaoError(
      'INVALID_QUORUM_RATE',
      `quorumRate must be in (0, ${QUORUM_RATE_SCALE}]`,
    );
  }
  if (!isPositiveDuration(config.votingDelay)) {
    throw new DaoError('ZERO_VOTING_DELAY', 'votingDelay must be a positive integer');
  }
  if (!isPositiveDuration(config.votingPeriod)) {
    throw new DaoError('ZERO_VOTING_PERIOD', 'votingPeriod must be a positive integer');
  }
  if (!isPositiveDuration(config.minActionDelay)) {
    throw new DaoError('ZERO_MIN_ACTION_DELAY', 'minActionDelay must be a positive integer');
  }
  if (config.minQuorumVotes <= 0n) {
    throw new DaoError('ZERO_MIN_QUORUM_VOTES', 'minQuorumVotes must be > 0');
  }
}

export function createDaoConfig(params: DaoConfig): DaoConfig {
  const config: DaoConfig = { ...params };
  validateDaoConfig(config);
  return config;
}

function pick<T>(override: Option<T>, current: T): T {
  return override.some ? override.value : current;
}

/**
 * Returns the configuration with every present override applied. Throws
 * without touching `config` when the result is invalid.
 */
export function applyConfigUpdate(config: DaoConfig, update: ConfigUpdate): DaoConfig {
  const next: DaoConfig = {
    votingDelay: pick(update.votingDelay, config.votingDelay),
    votingPeriod: pick(update.votingPeriod, config.votingPeriod),
    quorumRate: pick(update.quorumRate, config.quorumRate),
    minActionDelay: pick(update.minActionDelay, config.minActionDelay),
    minQuorumVotes: pick(update.minQuorumVotes, config.minQuorumVotes),
  };
  validateDaoConfig(next);
  return next;
}

function toOption<T>(value: T | undefined): Option<T> {
  return value === undefined ? none() : some(value);
}

/** Build an update from the fields to change; omitted fields stay as they are. */
export function configUpdate(changes: Partial<DaoConfig>): ConfigUpdate {
  return {
    votingDelay: toOption(changes.votingDelay),
    votingPeriod: toOption(changes.votingPeriod),
    quorumRate: toOption(changes.quorumRate),
    minActionDelay: toOption(changes.minActionDelay),
    minQuorumVotes: toOption(changes.minQuorumVotes),
  };
}

function parseDuration(value: unknown, field: string): number {
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed)) {
    throw new Error(`${field} must be an integer`);
  }
  return parsed;
}

function parseInteger(value: unknown, field: string): bigint {
  if (typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    return BigInt(value.trim());
  }
  throw new Error(`${field} must be an integer`);
}

/** Parse and validate a DAO configuration from an untyped record. */
export function parseDaoConfig(raw: Record<string, unknown>): DaoConfig {
  return createDaoConfig({
    votingDelay: parseDuration(raw.votingDelay, 'votingDelay'),
    votingPeriod: parseDuration(raw.votingPeriod, 'votingPeriod'),
    quorumRate: parseInteger(raw.quorumRate, 'quorumRate'),
    minActionDelay: parseDuration(raw.minActionDelay, 'minActionDelay'),
    minQuorumVotes: parseInteger(raw.minQuorumVotes, 'minQuorumVotes'),
  });
}

export function daoConfigFromGenesis(genesis: GenesisConfig): DaoConfig {
  return parseDaoConfig({ ...genesis });
}

/** JSON-safe view, the same shape as the genesis block of the node config. */
export function serializeDaoConfig(config: DaoConfig): GenesisConfig {
  return {
    votingDelay: config.votingDelay,
    votingPeriod: config.votingPeriod,
    quorumRate: config.quorumRate.toString(),
    minActionDelay: config.minActionDelay,
    minQuorumVotes: config.minQuorumVotes.toString(),
  };
}
