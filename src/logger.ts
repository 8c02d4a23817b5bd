import pino, { type Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export function createLogger(config: { level: LogLevel; pretty: boolean }): Logger {
  if (!config.pretty) {
    return pino({ level: config.level });
  }

  return pino({
    level: config.level,
    transport: {
      target: 'pino-pretty',
      options: { colorize: true, destination: 1 },
    },
  });
}
