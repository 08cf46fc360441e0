import pino, { type Logger } from 'pino';

export type { Logger };

/**
 * Process logger for the CLI. Writes JSON lines to stderr so the spinner and
 * report output on stdout stay readable.
 */
export function createLogger(options: { debug: boolean }): Logger {
  return pino(
    { name: 'nap-citation', level: options.debug ? 'debug' : 'info' },
    pino.destination(2)
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
