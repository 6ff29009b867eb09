import pino, { Logger } from 'pino';

export type { Logger };

/**
 * Root logger for the process. Components take a child via
 * `logger.child({ component })` rather than importing a shared instance.
 */
export function createLogger(level: string = 'info'): Logger {
  return pino({
    level,
    base: { service: 'issue-notifier' },
    redact: {
      paths: ['telegramBotToken', 'webhookSecret', 'githubToken', 'databaseUrl'],
      censor: '[redacted]',
    },
  });
}

/**
 * Logger that discards everything; used by tests
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
