import { readFile, writeFile } from 'node:fs/promises';
import { parse, stringify } from 'yaml';
import { isLogLevel, LogLevel } from '../logger.js';
import { ensureStorageDirs, StoragePaths } from './paths.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * DAO parameters at genesis. Amounts and the quorum rate are decimal
 * strings so YAML keeps integers beyond 2^53 intact.
 */
export interface GenesisConfig {
  votingDelay: number;
  votingPeriod: number;
  /** Fixed point, 1e9 = 100%. */
  quorumRate: string;
  minActionDelay: number;
  minQuorumVotes: string;
}

export interface NodeConfig {
  v: 1;
  logging?: {
    level?: LogLevel;
    file?: string;
  };
  storage?: {
    root?: string;
  };
  genesis?: Partial<GenesisConfig>;
}

export const DEFAULT_GENESIS: GenesisConfig = {
  votingDelay: DAY_MS,
  votingPeriod: 3 * DAY_MS,
  quorumRate: '500000000',
  minActionDelay: DAY_MS,
  minQuorumVotes: '1',
};

export const DEFAULT_CONFIG: NodeConfig = {
  v: 1,
  logging: {
    level: 'info',
  },
  genesis: { ...DEFAULT_GENESIS },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    return String(value);
  }
  if (typeof value !== 'string') {
    throw new Error(`${field} must be a string`);
  }
  return value;
}

function optionalNumber(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`${field} must be a number`);
  }
  return value;
}

/** Narrow a parsed YAML document to the config overrides it carries. */
export function parseNodeConfig(raw: unknown): Partial<NodeConfig> {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new Error('config must be a mapping');
  }
  const out: Partial<NodeConfig> = {};
  if (isRecord(raw.logging)) {
    const { level, file } = raw.logging;
    if (level !== undefined && !isLogLevel(level)) {
      throw new Error('logging.level must be debug, info, warn or error');
    }
    const logFile = optionalString(file, 'logging.file');
    out.logging = {
      ...(isLogLevel(level) ? { level } : {}),
      ...(logFile !== undefined ? { file: logFile } : {}),
    };
  }
  if (isRecord(raw.storage)) {
    const root = optionalString(raw.storage.root, 'storage.root');
    out.storage = root !== undefined ? { root } : {};
  }
  if (isRecord(raw.genesis)) {
    const genesis: Partial<GenesisConfig> = {};
    const votingDelay = optionalNumber(raw.genesis.votingDelay, 'genesis.votingDelay');
    const votingPeriod = optionalNumber(raw.genesis.votingPeriod, 'genesis.votingPeriod');
    const quorumRate = optionalString(raw.genesis.quorumRate, 'genesis.quorumRate');
    const minActionDelay = optionalNumber(raw.genesis.minActionDelay, 'genesis.minActionDelay');
    const minQuorumVotes = optionalString(raw.genesis.minQuorumVotes, 'genesis.minQuorumVotes');
    if (votingDelay !== undefined) genesis.votingDelay = votingDelay;
    if (votingPeriod !== undefined) genesis.votingPeriod = votingPeriod;
    if (quorumRate !== undefined) genesis.quorumRate = quorumRate;
    if (minActionDelay !== undefined) genesis.minActionDelay = minActionDelay;
    if (minQuorumVotes !== undefined) genesis.minQuorumVotes = minQuorumVotes;
    out.genesis = genesis;
  }
  return out;
}

function mergeConfig(base: NodeConfig, overrides: Partial<NodeConfig>): NodeConfig {
  return {
    ...base,
    ...overrides,
    logging: {
      ...base.logging,
      ...overrides.logging,
    },
    storage: {
      ...base.storage,
      ...overrides.storage,
    },
    genesis: {
      ...base.genesis,
      ...overrides.genesis,
    },
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function loadConfig(
  paths: StoragePaths,
  defaults: NodeConfig = DEFAULT_CONFIG,
): Promise<NodeConfig> {
  await ensureStorageDirs(paths);
  let raw: string;
  try {
    raw = await readFile(paths.configFile, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return defaults;
    }
    throw error;
  }
  return mergeConfig(defaults, parseNodeConfig(parse(raw)));
}

export async function saveConfig(paths: StoragePaths, config: NodeConfig): Promise<void> {
  await ensureStorageDirs(paths);
  await writeFile(paths.configFile, stringify(config), 'utf8');
}

export async function initConfig(paths: StoragePaths, config?: NodeConfig): Promise<NodeConfig> {
  const value = config ?? DEFAULT_CONFIG;
  await saveConfig(paths, value);
  return value;
}
