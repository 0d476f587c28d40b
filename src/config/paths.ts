/**
 * Path resolution for the tandem data directory.
 * Resolved once at startup into a plain object that is passed around;
 * nothing here caches or mutates module state.
 */

import path from 'node:path';
import os from 'node:os';
import { expandTilde } from '../lib/path.js';

export interface TandemPaths {
  dataDir: string;
  preferencesFile: string;
  settingsFile: string;
  tokenFile: string;
  gatewayConfigFile: string;
  logsDir: string;
  lockFile: string;
}

export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.TANDEM_HOME?.trim();
  return override ? path.resolve(expandTilde(override)) : path.join(os.homedir(), '.tandem');
}

export function resolvePaths(dataDir: string): TandemPaths {
  return {
    dataDir,
    preferencesFile: path.join(dataDir, 'preferences.conf'),
    settingsFile: path.join(dataDir, 'settings.json'),
    tokenFile: path.join(dataDir, 'gateway.token'),
    gatewayConfigFile: path.join(dataDir, 'gateway.json'),
    logsDir: path.join(dataDir, 'logs'),
    lockFile: path.join(dataDir, 'tandem.lock'),
  };
}

export function resolveLogFile(paths: TandemPaths, processName: string): string {
  return path.join(paths.logsDir, `${processName}.log`);
}
