/**
 * Error types shared across the orchestrator
 */

export class TandemError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Operator cancelled an interactive prompt (Ctrl+C / Esc) */
export class SetupCancelledError extends TandemError {
  constructor() {
    super('Setup cancelled.');
  }
}

/** settings.json or another config input failed validation */
export class ConfigError extends TandemError {}

export type ChatFailureKind = 'transport' | 'timeout' | 'aborted' | 'status' | 'parse';

/** A single chat-completion request failed; the relay recovers from these */
export class ChatRequestError extends TandemError {
  readonly kind: ChatFailureKind;
  readonly status?: number;

  constructor(kind: ChatFailureKind, message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.kind = kind;
    this.status = options?.status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** True for Node system errors carrying the given errno code */
export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
