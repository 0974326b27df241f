import { mkdir } from 'node:fs/promises';
import { homedir } from 'node:os';
import { resolve } from 'node:path';

export interface StoragePaths {
  root: string;
  data: string;
  logs: string;
  configFile: string;
}

export function defaultStorageRoot(): string {
  return process.env.STAKEGOV_HOME ?? resolve(homedir(), '.stakegov');
}

export function resolveStoragePaths(root: string = defaultStorageRoot()): StoragePaths {
  return {
    root,
    data: resolve(root, 'data'),
    logs: resolve(root, 'logs'),
    configFile: resolve(root, 'config.yaml'),
  };
}

export async function ensureStorageDirs(paths: StoragePaths): Promise<void> {
  await mkdir(paths.root, { recursive: true });
  await mkdir(paths.data, { recursive: true });
  await mkdir(paths.logs, { recursive: true });
}
