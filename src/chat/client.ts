/**
 * Chat-completions client for the gateway's OpenAI-compatible endpoint.
 * One request per turn; no history is sent.
 */

import { z } from 'zod';
import { ChatRequestError, errorMessage } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';

const CompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      role: z.string().optional(),
      content: z.string(),
    }),
  })).min(1),
});

export interface ChatClientOptions {
  /** e.g. http://127.0.0.1:18789 */
  baseUrl: string;
  token: string;
  /** Primary model reference, `llamacpp/<modelName>` */
  model: string;
  timeoutMs: number;
  fetch?: typeof fetch;
  log?: Logger;
}

export interface Completer {
  complete(userText: string, signal?: AbortSignal): Promise<string>;
}

export class ChatClient implements Completer {
  private readonly endpoint: string;
  private readonly fetchFn: typeof fetch;
  private readonly log: Logger;

  constructor(private readonly options: ChatClientOptions) {
    this.endpoint = new URL('/v1/chat/completions', options.baseUrl).toString();
    this.fetchFn = options.fetch ?? fetch;
    this.log = options.log ?? createLogger('chat');
  }

  get url(): string {
    return this.endpoint;
  }

  async complete(userText: string, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);
    const forward = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', forward, { once: true });

    try {
      const res = await this.send(userText, controller.signal, () => timedOut);
      const text = await this.read(res, controller.signal, () => timedOut);
      return this.parse(text);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forward);
    }
  }

  private async send(userText: string, signal: AbortSignal, timedOut: () => boolean): Promise<Response> {
    this.log.debug(`POST ${this.endpoint} (${userText.length} chars)`);
    try {
      return await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.options.token}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.options.model,
          messages: [{ role: 'user', content: userText }],
        }),
        signal,
      });
    } catch (err) {
      throw this.failure(err, signal, timedOut);
    }
  }

  private async read(res: Response, signal: AbortSignal, timedOut: () => boolean): Promise<string> {
    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      throw this.failure(err, signal, timedOut);
    }
    if (!res.ok) {
      throw new ChatRequestError('status', `Gateway answered ${res.status}: ${text.slice(0, 200)}`, {
        status: res.status,
      });
    }
    return text;
  }

  private parse(text: string): string {
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err) {
      throw new ChatRequestError('parse', 'Gateway response is not JSON', { cause: err });
    }
    const result = CompletionSchema.safeParse(body);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ChatRequestError('parse', `Unexpected response shape at ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
    return result.data.choices[0].message.content;
  }

  private failure(err: unknown, signal: AbortSignal, timedOut: () => boolean): ChatRequestError {
    if (timedOut()) {
      return new ChatRequestError('timeout', `No reply within ${this.options.timeoutMs}ms`, { cause: err });
    }
    if (signal.aborted) {
      return new ChatRequestError('aborted', 'Request aborted', { cause: err });
    }
    return new ChatRequestError('transport', `Cannot reach gateway at ${this.endpoint}: ${errorMessage(err)}`, { cause: err });
  }
}
