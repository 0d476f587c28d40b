import chalk from 'chalk';
import { log as clackLog } from '@clack/prompts';
import { ChatRelay, type RelayEnd } from '../chat/relay.js';
import { checkOnce, acceptListening } from '../process/readiness.js';
import { isComplete, loadPreferences, type Preferences } from '../config/preferences.js';
import { deriveModelName } from '../config/gateway-config.js';
import { TandemError } from '../lib/errors.js';
import { renderBanner, renderChatHint } from './banner.js';
import { ReadlineTerminal } from './terminal.js';
import { createChatClient, gatewayBaseUrl, loadContext, type RuntimeContext } from './context.js';
import { VERSION } from './version.js';

/** Run the relay against the gateway until exit, end of input or Ctrl+C */
export async function runChatSession(ctx: RuntimeContext, prefs: Preferences): Promise<RelayEnd> {
  const banner = () => renderBanner({
    version: VERSION,
    model: deriveModelName(prefs.modelFilePath),
    gatewayUrl: gatewayBaseUrl(ctx.settings),
    dataDir: ctx.paths.dataDir,
  });

  const controller = new AbortController();
  const interrupt = () => controller.abort();
  const terminal = new ReadlineTerminal({ redraw: banner, onInterrupt: interrupt });
  process.once('SIGINT', interrupt);

  banner();
  renderChatHint();

  try {
    return await new ChatRelay(createChatClient(ctx, prefs), terminal).run(controller.signal);
  } finally {
    process.removeListener('SIGINT', interrupt);
    terminal.close();
  }
}

/** Chat with an already running gateway; launches nothing */
export async function chat(): Promise<void> {
  const ctx = await loadContext();
  const prefs = await loadPreferences(ctx.paths.preferencesFile);
  if (!isComplete(prefs)) {
    throw new TandemError('Preferences are incomplete. Run "tandem up" or "tandem config edit" first.');
  }

  const url = gatewayBaseUrl(ctx.settings);
  if (!(await checkOnce(url, { accept: acceptListening }))) {
    clackLog.warn(`Gateway is not answering at ${chalk.cyan(url)}. Start it with ${chalk.cyan('tandem start')}.`);
  }

  await runChatSession(ctx, prefs);
}
