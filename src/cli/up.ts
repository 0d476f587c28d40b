import chalk from 'chalk';
import { intro, outro, confirm, log as clackLog } from '@clack/prompts';
import { ProcessSupervisor } from '../process/supervisor.js';
import { ShutdownCoordinator, type ShutdownReport } from '../process/shutdown.js';
import type { RelayEnd } from '../chat/relay.js';
import { bootServers } from './boot.js';
import { runChatSession } from './chat.js';
import { renderReady } from './banner.js';
import { loadContext, preparePreferences, withInstanceLock } from './context.js';

/** Default command: boot everything, chat, then offer to stop the servers */
export async function up(): Promise<void> {
  const bootStart = Date.now();
  const ctx = await loadContext();

  intro(chalk.bold('tandem'));
  const prefs = await preparePreferences(ctx);

  await withInstanceLock(ctx, async () => {
    const supervisor = new ProcessSupervisor();
    const { processes, ready } = await bootServers(ctx, prefs, { supervisor });
    renderReady({ ready, bootMs: Date.now() - bootStart });

    const { report } = await chatThenShutdown(
      async () => {
        const end = await runChatSession(ctx, prefs);
        if (end === 'eof') process.stderr.write('\n');
        return end;
      },
      new ShutdownCoordinator(supervisor, [processes.backend, processes.gateway]),
    );
    printShutdownReport(report);
  });

  outro('Bye.');
}

export type ConfirmFn = () => Promise<boolean>;

async function confirmStop(): Promise<boolean> {
  const answer = await confirm({ message: 'Stop the backend and gateway?', initialValue: false });
  return answer === true;
}

/**
 * Runs the chat session to its end, then asks whether to stop the servers.
 * A declined or cancelled answer leaves them running.
 */
export async function chatThenShutdown(
  run: () => Promise<RelayEnd>,
  coordinator: ShutdownCoordinator,
  ask: ConfirmFn = confirmStop,
): Promise<{ end: RelayEnd; report: ShutdownReport }> {
  const end = await run();
  const report = await coordinator.shutdown(await ask());
  return { end, report };
}

export function printShutdownReport(report: ShutdownReport): void {
  if (report.action === 'left-running') {
    clackLog.info(`Left running: ${report.processes.join(', ')}`);
    return;
  }
  for (const { name, killed } of report.processes) {
    if (killed > 0) clackLog.success(`Stopped ${name}`);
    else clackLog.info(`${name} was not running`);
  }
}
