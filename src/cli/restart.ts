import chalk from 'chalk';
import { intro, outro, log as clackLog } from '@clack/prompts';
import { ProcessSupervisor } from '../process/supervisor.js';
import { bootServers } from './boot.js';
import { renderReady } from './banner.js';
import { loadContext, managedProcesses, preparePreferences, withInstanceLock } from './context.js';

/** Kill both processes and launch them again with a freshly written config */
export async function restart(): Promise<void> {
  const bootStart = Date.now();
  const ctx = await loadContext();

  intro(chalk.bold('tandem restart'));
  const prefs = await preparePreferences(ctx);

  const ready = await withInstanceLock(ctx, async () => {
    const supervisor = new ProcessSupervisor();
    const { backend, gateway } = managedProcesses(ctx, prefs);
    for (const proc of [gateway, backend]) {
      const killed = await supervisor.stop(proc);
      clackLog.step(killed > 0 ? `Stopped ${proc.name}` : `${proc.name} was not running`);
    }
    const result = await bootServers(ctx, prefs, { supervisor });
    return result.ready;
  });

  renderReady({ ready, bootMs: Date.now() - bootStart });
  outro('Restarted.');
}
