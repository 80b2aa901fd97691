export const LOG_LEVELS = ['silent', 'error', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  error(...args: unknown[]): void;
  info(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

type Sink = (...args: unknown[]) => void;

/**
 * Leveled logger over stderr. Stdout carries protocol frames in both entry
 * points, so nothing here may ever write to it.
 */
export function createLogger(level: LogLevel, sink: Sink = console.error): Logger {
  const rank = LOG_LEVELS.indexOf(level);
  const at = (threshold: LogLevel): Sink => (...args) => {
    if (rank >= LOG_LEVELS.indexOf(threshold)) {
      sink('[glyphscript]', ...args);
    }
  };
  return { error: at('error'), info: at('info'), debug: at('debug') };
}
