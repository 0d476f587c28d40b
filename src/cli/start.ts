import chalk from 'chalk';
import { intro, outro } from '@clack/prompts';
import { bootServers, describeOutcome } from './boot.js';
import { renderReady, renderNextSteps } from './banner.js';
import { loadContext, preparePreferences, withInstanceLock } from './context.js';

/** Launch backend and gateway and return, leaving both running */
export async function start(): Promise<void> {
  const bootStart = Date.now();
  const ctx = await loadContext();

  intro(chalk.bold('tandem start'));
  const prefs = await preparePreferences(ctx);

  const result = await withInstanceLock(ctx, () => bootServers(ctx, prefs));
  renderReady({ ready: result.ready, bootMs: Date.now() - bootStart });
  renderNextSteps();

  outro(`backend ${describeOutcome(result.outcomes.backend)}, gateway ${describeOutcome(result.outcomes.gateway)}`);
}
