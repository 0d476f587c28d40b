/**
 * Bring the backend and gateway up: synthesize the gateway config, ensure
 * both processes, then wait for their HTTP endpoints.
 */

import { log as clackLog, spinner } from '@clack/prompts';
import chalk from 'chalk';
import type { Preferences } from '../config/preferences.js';
import { ProcessSupervisor, type EnsureOutcome } from '../process/supervisor.js';
import { waitForHttp, acceptOk, acceptListening } from '../process/readiness.js';
import {
  backendHealthUrl,
  gatewayBaseUrl,
  managedProcesses,
  synthesizeGatewayConfig,
  type ManagedProcesses,
  type RuntimeContext,
} from './context.js';

export interface BootResult {
  processes: ManagedProcesses;
  outcomes: { backend: EnsureOutcome; gateway: EnsureOutcome };
  configChanged: boolean;
  ready: boolean;
}

export interface BootOptions {
  supervisor?: ProcessSupervisor;
  signal?: AbortSignal;
  /** Skip the readiness wait */
  noWait?: boolean;
}

export async function bootServers(
  ctx: RuntimeContext,
  prefs: Preferences,
  options: BootOptions = {},
): Promise<BootResult> {
  const supervisor = options.supervisor ?? new ProcessSupervisor();
  const processes = managedProcesses(ctx, prefs);

  const written = await synthesizeGatewayConfig(ctx, prefs);
  clackLog.step(`Gateway config ${written.changed ? 'written' : 'unchanged'}: ${chalk.dim(written.path)}`);

  const backend = await supervisor.ensureRunning(processes.backend);
  const gateway = await supervisor.ensureRunning(processes.gateway);

  // An adopted gateway keeps whatever config it was started with
  if (gateway === 'adopted' && written.changed) {
    clackLog.warn(`The running gateway was started with an older config. Run ${chalk.cyan('tandem restart')} to apply it.`);
  }

  const failed = [processes.backend, processes.gateway].filter((p) => p.state === 'unknown');
  for (const proc of failed) {
    clackLog.error(`${proc.name} did not start. Check ${chalk.cyan(proc.executablePath)} and ${chalk.dim(proc.logFile ?? 'its log')}.`);
  }

  const ready = failed.length > 0
    ? false
    : options.noWait ? true : await waitForServers(ctx, options.signal);
  return { processes, outcomes: { backend, gateway }, configChanged: written.changed, ready };
}

export async function waitForServers(ctx: RuntimeContext, signal?: AbortSignal): Promise<boolean> {
  const { readinessTimeoutMs } = ctx.settings;
  const s = spinner();

  s.start('Waiting for the backend to load the model');
  const backendReady = await waitForHttp(backendHealthUrl(ctx.settings), {
    timeoutMs: readinessTimeoutMs,
    accept: acceptOk,
    signal,
  });
  s.stop(backendReady ? 'Backend ready' : chalk.yellow('Backend did not report healthy in time'));

  s.start('Waiting for the gateway');
  const gatewayReady = await waitForHttp(gatewayBaseUrl(ctx.settings), {
    timeoutMs: readinessTimeoutMs,
    accept: acceptListening,
    signal,
  });
  s.stop(gatewayReady ? 'Gateway ready' : chalk.yellow('Gateway is not answering yet'));

  return backendReady && gatewayReady;
}

export function describeOutcome(outcome: EnsureOutcome): string {
  switch (outcome) {
    case 'already-running': return 'running';
    case 'adopted': return 'already running, launch skipped';
    case 'spawned': return 'launched';
    case 'failed': return 'failed to launch';
  }
}
