/**
 * Readline-backed terminal for the chat relay. Lines are queued as they
 * arrive so input typed during a request is not lost.
 */

import readline from 'node:readline';
import chalk from 'chalk';
import type { RelayTerminal } from '../chat/relay.js';

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export interface TerminalOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream & { isTTY?: boolean };
  /** Redraws the banner after the screen is cleared */
  redraw?: () => void;
  /** Ctrl+C while reading */
  onInterrupt?: () => void;
}

export class ReadlineTerminal implements RelayTerminal {
  private readonly rl: readline.Interface;
  private readonly output: NodeJS.WritableStream & { isTTY?: boolean };
  private readonly queue: string[] = [];
  private waiter: ((line: string | null) => void) | null = null;
  private closed = false;

  constructor(private readonly options: TerminalOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: this.output,
      prompt: chalk.cyan('  > '),
    });
    this.rl.on('line', (line) => this.push(line));
    this.rl.on('close', () => {
      this.closed = true;
      this.settle(null);
    });
    this.rl.on('SIGINT', () => this.options.onInterrupt?.());
  }

  async readLine(signal?: AbortSignal): Promise<string | null> {
    const queued = this.queue.shift();
    if (queued !== undefined) return queued;
    if (this.closed || signal?.aborted) return null;

    this.rl.prompt();
    return new Promise((resolve) => {
      const onAbort = () => this.settle(null);
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = (line) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(line);
      };
    });
  }

  showReply(text: string): void {
    this.output.write(`\n${text}\n\n`);
  }

  showFailure(message: string): void {
    this.output.write(`${chalk.red(message)}\n`);
  }

  clear(): void {
    readline.cursorTo(this.output, 0, 0);
    readline.clearScreenDown(this.output);
    this.options.redraw?.();
  }

  /** Animated "Thinking..." until the reply arrives; TTY only */
  busy(): () => void {
    if (!this.output.isTTY) return () => {};
    let i = 0;
    this.output.write(chalk.dim(`  ${FRAMES[0]} Thinking...`));
    const timer = setInterval(() => {
      i = (i + 1) % FRAMES.length;
      this.output.write(`\r${chalk.dim(`  ${FRAMES[i]} Thinking...`)}`);
    }, 80);
    return () => {
      clearInterval(timer);
      this.output.write('\r\x1b[K');
    };
  }

  close(): void {
    this.rl.close();
  }

  private push(line: string): void {
    if (this.waiter) this.settle(line);
    else this.queue.push(line);
  }

  private settle(line: string | null): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(line);
  }
}
