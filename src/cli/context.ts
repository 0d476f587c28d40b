/**
 * Explicit runtime context, built once per command and handed to every
 * component. Nothing below reads process-wide path state.
 */

import path from 'node:path';
import { resolveDataDir, resolvePaths, resolveLogFile, type TandemPaths } from '../config/paths.js';
import { loadSettings, type Settings } from '../config/settings.js';
import { loadOrCreateToken } from '../config/token.js';
import {
  loadPreferences,
  savePreferences,
  type Preferences,
} from '../config/preferences.js';
import { capturePreferences, askWithClack, type AskFn } from '../config/onboard.js';
import {
  LOOPBACK_HOST,
  primaryModelRef,
  renderGatewayConfig,
  synthesisConstants,
  writeGatewayConfig,
  type WriteResult,
} from '../config/gateway-config.js';
import { createManagedProcess, type ManagedProcess } from '../process/supervisor.js';
import { ChatClient } from '../chat/client.js';
import { TandemError } from '../lib/errors.js';
import { InstanceLock, describeHolder } from './lock.js';

export interface RuntimeContext {
  paths: TandemPaths;
  settings: Settings;
  token: string;
}

export interface ManagedProcesses {
  backend: ManagedProcess;
  gateway: ManagedProcess;
}

export async function loadContext(env: NodeJS.ProcessEnv = process.env): Promise<RuntimeContext> {
  const paths = resolvePaths(resolveDataDir(env));
  const settings = await loadSettings(paths.settingsFile);
  const token = await loadOrCreateToken(paths.tokenFile);
  return { paths, settings, token };
}

/**
 * Load the stored preferences, prompt for whatever is missing, and rewrite
 * the file in full.
 */
export async function preparePreferences(ctx: RuntimeContext, ask: AskFn = askWithClack): Promise<Preferences> {
  const stored = await loadPreferences(ctx.paths.preferencesFile);
  const prefs = await capturePreferences(stored, ask);
  await savePreferences(ctx.paths.preferencesFile, prefs);
  return prefs;
}

export function backendLaunchArguments(prefs: Preferences, settings: Settings): string[] {
  return [
    '-m', prefs.modelFilePath,
    '-c', String(settings.contextSize),
    '--port', String(settings.backendPort),
    '--host', LOOPBACK_HOST,
  ];
}

export function gatewayLaunchArguments(configFile: string): string[] {
  return [path.resolve(configFile)];
}

export function managedProcesses(ctx: RuntimeContext, prefs: Preferences): ManagedProcesses {
  return {
    backend: createManagedProcess({
      name: 'backend',
      executablePath: prefs.backendExecutablePath,
      launchArguments: backendLaunchArguments(prefs, ctx.settings),
      logFile: resolveLogFile(ctx.paths, 'backend'),
      cwd: ctx.paths.dataDir,
    }),
    gateway: createManagedProcess({
      name: 'gateway',
      executablePath: prefs.gatewayExecutablePath,
      launchArguments: gatewayLaunchArguments(ctx.paths.gatewayConfigFile),
      logFile: resolveLogFile(ctx.paths, 'gateway'),
      cwd: ctx.paths.dataDir,
    }),
  };
}

export function synthesizeGatewayConfig(ctx: RuntimeContext, prefs: Preferences): Promise<WriteResult> {
  const text = renderGatewayConfig(prefs, synthesisConstants(ctx.settings, ctx.token));
  return writeGatewayConfig(ctx.paths.gatewayConfigFile, text);
}

export function backendHealthUrl(settings: Settings): string {
  return `http://${LOOPBACK_HOST}:${settings.backendPort}/health`;
}

export function gatewayBaseUrl(settings: Settings): string {
  return `http://${LOOPBACK_HOST}:${settings.gatewayPort}/`;
}

export function createChatClient(ctx: RuntimeContext, prefs: Preferences): ChatClient {
  return new ChatClient({
    baseUrl: gatewayBaseUrl(ctx.settings),
    token: ctx.token,
    model: primaryModelRef(prefs.modelFilePath),
    timeoutMs: ctx.settings.requestTimeoutMs,
  });
}

/** Run `fn` holding the instance lock; refuses when another orchestrator has it */
export async function withInstanceLock<T>(ctx: RuntimeContext, fn: () => Promise<T>): Promise<T> {
  const lock = new InstanceLock(ctx.paths.lockFile);
  const holder = await lock.acquire();
  if (holder) {
    throw new TandemError(`Another tandem instance is running (${describeHolder(holder)}).`);
  }
  try {
    return await fn();
  } finally {
    lock.release();
  }
}
