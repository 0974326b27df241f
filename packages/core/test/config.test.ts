import { afterEach, describe, expect, it } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_GENESIS, loadConfig, parseNodeConfig, saveConfig } from '../src/storage/config.js';
import { resolveStoragePaths } from '../src/storage/paths.js';

let tempDir: string | null = null;

async function createPaths() {
  tempDir = await mkdtemp(join(tmpdir(), 'stakegov-config-'));
  return resolveStoragePaths(tempDir);
}

afterEach(async () => {
  if (tempDir) {
    await rm(tempDir, { recursive: true, force: true });
    tempDir = null;
  }
});

describe('config', () => {
  it('loads defaults and persists changes', async () => {
    const paths = await createPaths();
    const config = await loadConfig(paths);
    expect(config.logging).toEqual({ level: 'info' });
    expect(config.genesis).toEqual(DEFAULT_GENESIS);

    await saveConfig(paths, { ...config, logging: { level: 'debug', file: 'governance.log' } });

    const loaded = await loadConfig(paths);
    expect(loaded.v).toBe(1);
    expect(loaded.logging).toEqual({ level: 'debug', file: 'governance.log' });
    expect(loaded.genesis).toEqual(DEFAULT_GENESIS);
  });

  it('merges a partial genesis block over the defaults', async () => {
    const paths = await createPaths();
    await writeFile(
      paths.configFile,
      ['logging:', '  level: warn', 'genesis:', '  votingPeriod: 5000', '  quorumRate: 600000000', ''].join(
        '\n',
      ),
      'utf8',
    );

    const loaded = await loadConfig(paths);
    expect(loaded.logging).toEqual({ level: 'warn' });
    expect(loaded.genesis).toEqual({
      ...DEFAULT_GENESIS,
      votingPeriod: 5000,
      quorumRate: '600000000',
    });
  });

  it('rejects an unknown log level', async () => {
    const paths = await createPaths();
    await writeFile(paths.configFile, 'logging:\n  level: loud\n', 'utf8');
    await expect(loadConfig(paths)).rejects.toThrow(
      'logging.level must be debug, info, warn or error',
    );
  });

  it('creates only the directories it uses', async () => {
    const paths = await createPaths();
    await loadConfig(paths);
    expect((await readdir(paths.root)).sort()).toEqual(['data', 'logs']);
  });

  it('ignores keys it does not know', () => {
    expect(parseNodeConfig({ network: 'testnet', storage: { root: '/srv/gov' } })).toEqual({
      storage: { root: '/srv/gov' },
    });
  });

  it('parses an empty document as no overrides', () => {
    expect(parseNodeConfig(null)).toEqual({});
    expect(() => parseNodeConfig(['a'])).toThrow('config must be a mapping');
  });
});
