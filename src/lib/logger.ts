/**
 * Console logging with a scope/timestamp prefix. Silent unless enabled
 * (SEATING_DEBUG), so library callers and test runs stay quiet.
 */

export interface Logger {
  info: (message: string, details?: unknown) => void;
  warn: (message: string, details?: unknown) => void;
  error: (message: string, details?: unknown) => void;
  time: (label: string) => void;
  timeEnd: (label: string) => void;
}

export function createLogger(scope: string, enabled: boolean): Logger {
  const prefix = () => `[${scope} ${new Date().toISOString()}]`;
  const emit =
    (write: (...args: unknown[]) => void) =>
    (message: string, details?: unknown) => {
      if (!enabled) return;
      if (details === undefined) write(`${prefix()} ${message}`);
      else write(`${prefix()} ${message}`, details);
    };

  return {
    info: emit(console.log),
    warn: emit(console.warn),
    error: emit(console.error),
    time: (label) => {
      if (enabled) console.time(label);
    },
    timeEnd: (label) => {
      if (enabled) console.timeEnd(label);
    },
  };
}
