/**
 * Interactive chat loop. Each turn is isolated: a failed request prints a
 * fixed message and the loop goes back to the prompt.
 */

import { EventEmitter } from 'node:events';
import { ChatRequestError, errorMessage } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';
import type { Completer } from './client.js';

export const TURN_FAILURE_MESSAGE = 'Could not get a reply from the gateway.';

export type RelayState = 'prompting' | 'dispatching' | 'displaying' | 'clear-screen' | 'shutdown';
export type RelayEnd = 'exit' | 'eof' | 'interrupt';

export type InputAction =
  | { kind: 'exit' }
  | { kind: 'clear' }
  | { kind: 'skip' }
  | { kind: 'send'; text: string };

/** Ephemeral record of one turn; never persisted */
export type ChatTurn =
  | { userText: string; assistantText: string }
  | { userText: string; failureReason: string };

export interface RelayTerminal {
  /** Next line of input, or null at end of input or once the signal aborts */
  readLine(signal?: AbortSignal): Promise<string | null>;
  showReply(text: string): void;
  showFailure(message: string): void;
  /** Clear the screen and redraw the banner */
  clear(): void;
  /** Optional busy indicator while a request is in flight; returns its stop function */
  busy?(): () => void;
}

export function classifyInput(line: string): InputAction {
  const text = line.trim();
  if (!text) return { kind: 'skip' };
  const command = text.toLowerCase();
  if (command === 'exit') return { kind: 'exit' };
  if (command === 'cls') return { kind: 'clear' };
  return { kind: 'send', text };
}

export class ChatRelay extends EventEmitter {
  private current: RelayState = 'prompting';
  private readonly log: Logger;

  constructor(
    private readonly completer: Completer,
    private readonly terminal: RelayTerminal,
    log?: Logger,
  ) {
    super();
    this.log = log ?? createLogger('relay');
  }

  get state(): RelayState {
    return this.current;
  }

  /** Run until `exit`, end of input or the signal aborts */
  async run(signal?: AbortSignal): Promise<RelayEnd> {
    for (;;) {
      this.transition('prompting');
      const line = await this.terminal.readLine(signal);
      if (signal?.aborted) return this.end('interrupt');
      if (line === null) return this.end('eof');

      const action = classifyInput(line);
      switch (action.kind) {
        case 'skip':
          continue;
        case 'exit':
          return this.end('exit');
        case 'clear':
          this.transition('clear-screen');
          this.terminal.clear();
          continue;
        case 'send':
          await this.dispatch(action.text, signal);
          if (signal?.aborted) return this.end('interrupt');
      }
    }
  }

  private async dispatch(userText: string, signal?: AbortSignal): Promise<void> {
    this.transition('dispatching');
    const stopBusy = this.terminal.busy?.();
    let turn: ChatTurn;
    try {
      const assistantText = await this.completer.complete(userText, signal);
      turn = { userText, assistantText };
    } catch (err) {
      const reason = err instanceof ChatRequestError ? `${err.kind}: ${err.message}` : errorMessage(err);
      this.log.debug(`turn failed (${reason})`);
      turn = { userText, failureReason: reason };
    } finally {
      stopBusy?.();
    }

    if (signal?.aborted) return;
    this.transition('displaying');
    if ('assistantText' in turn) {
      this.terminal.showReply(turn.assistantText);
    } else {
      this.terminal.showFailure(TURN_FAILURE_MESSAGE);
    }
    this.emit('turn', turn);
  }

  private transition(next: RelayState): void {
    this.current = next;
    this.emit('state', next);
  }

  private end(reason: RelayEnd): RelayEnd {
    this.transition('shutdown');
    this.log.debug(`loop ended (${reason})`);
    return reason;
  }
}
