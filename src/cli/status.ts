import chalk from 'chalk';
import { ProcessSupervisor, type ManagedProcess } from '../process/supervisor.js';
import { checkOnce, acceptOk, acceptListening } from '../process/readiness.js';
import { isComplete, loadPreferences, missingPreferences, PREFERENCE_KEYS } from '../config/preferences.js';
import { renderServices, shortenHome, type ServiceStatus } from './banner.js';
import { backendHealthUrl, gatewayBaseUrl, loadContext, managedProcesses } from './context.js';

async function processStatus(
  supervisor: ProcessSupervisor,
  proc: ManagedProcess,
  url: string,
  accept: (status: number) => boolean,
): Promise<ServiceStatus> {
  const state = await supervisor.refresh(proc);
  const answering = await checkOnce(url, { accept, attemptTimeoutMs: 2000 });
  const parts = [
    state === 'running' && proc.pid !== undefined ? `PID ${proc.pid}` : state,
    `${url} ${answering ? 'answering' : 'not answering'}`,
  ];
  return { name: proc.name, ok: state === 'running' && answering, detail: parts.join(' · ') };
}

export async function status(): Promise<void> {
  const ctx = await loadContext();
  const prefs = await loadPreferences(ctx.paths.preferencesFile);

  console.error(`\n  ${chalk.bold('tandem')} ${chalk.dim('status')}  ${chalk.dim(shortenHome(ctx.paths.dataDir))}\n`);

  if (!isComplete(prefs)) {
    const missing = missingPreferences(prefs).map((f) => PREFERENCE_KEYS[f]).join(', ');
    console.error(chalk.yellow(`  Preferences incomplete (missing ${missing}). Run: tandem config edit\n`));
    return;
  }

  const supervisor = new ProcessSupervisor();
  const { backend, gateway } = managedProcesses(ctx, prefs);
  renderServices([
    await processStatus(supervisor, backend, backendHealthUrl(ctx.settings), acceptOk),
    await processStatus(supervisor, gateway, gatewayBaseUrl(ctx.settings), acceptListening),
  ]);
  console.error('');
}
