import chalk from 'chalk';
import { log as clackLog } from '@clack/prompts';
import {
  PREFERENCE_FIELDS,
  PREFERENCE_KEYS,
  loadPreferences,
  savePreferences,
} from '../config/preferences.js';
import { editPreferences } from '../config/onboard.js';
import { primaryModelRef } from '../config/gateway-config.js';
import { HostProcessTable } from '../process/table.js';
import { fileName } from '../lib/path.js';
import { LABEL, DIM, pad, shortenHome } from './banner.js';
import { loadContext, synthesizeGatewayConfig, withInstanceLock } from './context.js';

export function maskToken(token: string): string {
  if (token.length <= 8) return '****';
  return `${token.slice(0, 4)}...${token.slice(-4)}`;
}

export async function show(): Promise<void> {
  const ctx = await loadContext();
  const prefs = await loadPreferences(ctx.paths.preferencesFile);
  const { paths, settings } = ctx;

  console.log(`\n  ${chalk.bold('Preferences')}  ${DIM(shortenHome(paths.preferencesFile))}\n`);
  for (const field of PREFERENCE_FIELDS) {
    const value = prefs[field];
    console.log(`    ${LABEL(pad(PREFERENCE_KEYS[field], 16))}${value ?? chalk.yellow('(not set)')}`);
  }
  if (prefs.modelFilePath) {
    console.log(`    ${LABEL(pad('primary model', 16))}${chalk.cyan(primaryModelRef(prefs.modelFilePath))}`);
  }

  console.log(`\n  ${chalk.bold('Settings')}  ${DIM(shortenHome(paths.settingsFile))}\n`);
  for (const [key, value] of Object.entries(settings)) {
    console.log(`    ${LABEL(pad(key, 20))}${value}`);
  }

  console.log(`\n  ${chalk.bold('Files')}\n`);
  console.log(`    ${LABEL(pad('gateway config', 16))}${shortenHome(paths.gatewayConfigFile)}`);
  console.log(`    ${LABEL(pad('token', 16))}${maskToken(ctx.token)}`);
  console.log(`    ${LABEL(pad('logs', 16))}${shortenHome(paths.logsDir)}`);
  console.log();
}

/** Re-prompt all four paths, save them and re-synthesize the gateway config */
export async function edit(): Promise<void> {
  const ctx = await loadContext();

  await withInstanceLock(ctx, async () => {
    const current = await loadPreferences(ctx.paths.preferencesFile);
    const prefs = await editPreferences(current);
    await savePreferences(ctx.paths.preferencesFile, prefs);
    clackLog.success(`Saved ${shortenHome(ctx.paths.preferencesFile)}`);

    const written = await synthesizeGatewayConfig(ctx, prefs);
    if (!written.changed) {
      clackLog.info('Gateway config unchanged.');
      return;
    }
    clackLog.success(`Gateway config written: ${shortenHome(written.path)}`);

    const running = await new HostProcessTable().find(fileName(prefs.gatewayExecutablePath));
    if (running.length > 0) {
      clackLog.warn(`The gateway is running with the previous config. Run ${chalk.cyan('tandem restart')} to apply it.`);
    }
  });
}
