import pino from 'pino';

export type Logger = pino.Logger;

export interface LoggingConfig {
  level?: pino.LoggerOptions['level'];
  /** Append JSON lines to this file instead of stdout */
  file?: string;
}

export function createLogger(config?: LoggingConfig): Logger {
  const options: pino.LoggerOptions = {
    name: 'pdf-gate',
    level: config?.level ?? 'info',
  };

  if (config?.file) {
    return pino(options, pino.destination(config.file));
  }

  return pino(options);
}

export const silentLogger: Logger = pino({ level: 'silent' });
