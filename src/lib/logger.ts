const DEBUG = process.env.DEBUG;
const enabled = !!DEBUG;
const filter = DEBUG && DEBUG !== '1'
  ? new Set(DEBUG.split(','))
  : null;

const bootTime = Date.now();

function ts(): string {
  const delta = ((Date.now() - bootTime) / 1000).toFixed(1);
  return `+${delta}s`;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Scoped stderr logger. `debug` output is off unless DEBUG=1, or DEBUG lists
 * the scope (DEBUG=supervisor,relay); info/warn/error always print.
 */
export function createLogger(scope: string): Logger {
  const active = enabled && (!filter || filter.has(scope));

  return {
    debug(...args: unknown[]) {
      if (!active) return;
      console.error(`${ts()} [${scope}]`, ...args);
    },
    info(...args: unknown[]) {
      console.error(`${ts()} [${scope}]`, ...args);
    },
    warn(...args: unknown[]) {
      console.error(`${ts()} [${scope}] WARN`, ...args);
    },
    error(...args: unknown[]) {
      console.error(`${ts()} [${scope}] ERROR`, ...args);
    },
  };
}

const noop = () => {};

/** Logger that drops everything, for tests */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
