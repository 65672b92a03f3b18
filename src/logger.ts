import pino from 'pino';

export type Logger = pino.Logger;

export interface LoggerOptions {
  level?: pino.LevelWithSilent;
  /** Service name stamped on every line */
  name?: string;
}

/**
 * Build the root logger
 *
 * Components derive children with `logger.child({ component })`. Token
 * values and voter identifiers must never be passed as log fields.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'sealed-ballot',
    level: options.level ?? 'info',
    redact: {
      paths: [
        'identityToken',
        'ballotToken',
        'receipt',
        'secondFactor',
        '*.identityToken',
        '*.ballotToken',
        '*.receipt',
        '*.secondFactor',
        'req.headers["x-api-key"]',
      ],
      censor: '[redacted]',
    },
  });
}

/**
 * Logger that drops everything, for tests and embedded use
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
