import { pino, type Logger, type LoggerOptions } from 'pino';

export function createLogger(level = process.env['LOG_LEVEL'] ?? 'info'): Logger {
  const options: LoggerOptions =
    process.env['NODE_ENV'] !== 'production'
      ? {
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss',
              ignore: 'pid,hostname',
            },
          },
        }
      : {
          level,
          base: { service: 'load-runner' },
        };

  return pino(options);
}
