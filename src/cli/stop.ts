import chalk from 'chalk';
import { confirm, isCancel } from '@clack/prompts';
import { ProcessSupervisor } from '../process/supervisor.js';
import { ShutdownCoordinator } from '../process/shutdown.js';
import { isComplete, loadPreferences } from '../config/preferences.js';
import { loadContext, managedProcesses } from './context.js';
import { printShutdownReport } from './up.js';

/** Hard-kill backend and gateway. `--yes` skips the confirmation. */
export async function stop(args: string[] = []): Promise<void> {
  const ctx = await loadContext();
  const prefs = await loadPreferences(ctx.paths.preferencesFile);
  if (!isComplete(prefs)) {
    console.log(chalk.yellow('  Nothing to stop: preferences are not configured.'));
    return;
  }

  let confirmed = args.includes('--yes') || args.includes('-y');
  if (!confirmed) {
    const answer = await confirm({ message: 'Stop the backend and gateway?' });
    if (isCancel(answer)) return;
    confirmed = answer;
  }

  const { backend, gateway } = managedProcesses(ctx, prefs);
  const report = await new ShutdownCoordinator(new ProcessSupervisor(), [backend, gateway]).shutdown(confirmed);
  printShutdownReport(report);
}
