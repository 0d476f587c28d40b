import os from 'node:os';
import chalk from 'chalk';

export interface ServiceStatus {
  name: string;
  ok: boolean;
  detail?: string;
}

export interface BannerData {
  version: string;
  model: string;
  gatewayUrl: string;
  dataDir: string;
}

export const DIM = chalk.dim;
const OK = chalk.green('✓');
const FAIL = chalk.red('✗');
const WARN = chalk.yellow('⚠');
const LINK = chalk.cyan;
export const LABEL = chalk.gray;
const BOLD = chalk.bold;

export function shortenHome(p: string): string {
  const home = os.homedir();
  return p.startsWith(home) ? '~' + p.slice(home.length) : p;
}

export function pad(label: string, width = 12): string {
  return label.padEnd(width);
}

// Banner and status go to stderr; stdout carries only assistant replies
const out = (s: string) => process.stderr.write(s + '\n');

const LOGO = [
  ['#####', '  #  ', '  #  ', '  #  ', '  #  '], // T
  [' ### ', '#   #', '#####', '#   #', '#   #'], // A
  ['#   #', '##  #', '# # #', '#  ##', '#   #'], // N
  ['#### ', '#   #', '#   #', '#   #', '#### '], // D
  ['#####', '#    ', '#### ', '#    ', '#####'], // E
  ['#   #', '## ##', '# # #', '#   #', '#   #'], // M
];

const LOGO_COLORS = ['#f97316', '#f59e0b', '#eab308', '#84cc16', '#22c55e', '#10b981'];

function renderLogo(): void {
  for (let row = 0; row < 5; row++) {
    let line = '  ';
    for (let i = 0; i < LOGO.length; i++) {
      const color = chalk.hex(LOGO_COLORS[i]);
      for (const ch of LOGO[i][row]) {
        line += ch === '#' ? color('██') : '  ';
      }
      if (i < LOGO.length - 1) line += '  ';
    }
    out(line);
  }
}

export function renderBanner(data: BannerData): void {
  out('');
  renderLogo();
  out(`  ${DIM('v' + data.version)}`);
  out('');
  out(`  ${LABEL(pad('Model'))}${data.model}`);
  out(`  ${LABEL(pad('Gateway'))}${LINK(data.gatewayUrl)}`);
  out(`  ${LABEL(pad('Data'))}${shortenHome(data.dataDir)}`);
  out('');
}

export function renderServices(services: ServiceStatus[]): void {
  out(`  ${LABEL('Processes')}`);
  for (const s of services) {
    const icon = s.ok ? OK : FAIL;
    const detail = s.detail ? DIM(` ${s.detail}`) : '';
    out(`    ${icon} ${pad(s.name)}${detail}`);
  }
}

export function renderReady(data: { ready: boolean; bootMs?: number }): void {
  const timing = data.bootMs ? DIM(`  ${(data.bootMs / 1000).toFixed(1)}s`) : '';
  out('');
  if (data.ready) {
    out(`  ${chalk.green(BOLD('Ready'))}${timing}`);
  } else {
    out(`  ${WARN} ${chalk.yellow('Servers not answering yet; turns may fail until they are up')}${timing}`);
  }
}

export function renderChatHint(): void {
  out(DIM('  Type a message to chat. "cls" clears the screen, "exit" quits.'));
  out('');
}

export function renderNextSteps(): void {
  const cmds: [string, string][] = [
    ['tandem chat', 'Chat with the running gateway'],
    ['tandem status', 'Process and endpoint status'],
    ['tandem stop', 'Stop backend and gateway'],
  ];
  const maxCmd = Math.max(...cmds.map(([c]) => c.length));
  out('');
  for (const [cmd, desc] of cmds) {
    out(`  ${LINK(cmd)}${DIM(' '.repeat(maxCmd - cmd.length + 4) + desc)}`);
  }
  out('');
}
