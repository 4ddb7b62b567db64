import pino from 'pino';
import { getEnvironment } from '../config/environment.js';

let _logger: pino.Logger | undefined;

export function createLogger(): pino.Logger {
  const env = getEnvironment();

  // stdout belongs to CLI output, so every record goes to stderr (fd 2)
  _logger = pino(
    {
      level: env.LOG_LEVEL,
      transport:
        env.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
                translateTime: 'HH:MM:ss',
                ignore: 'pid,hostname',
                destination: 2,
              },
            }
          : undefined,
    },
    env.NODE_ENV === 'development' ? undefined : pino.destination(2),
  );

  return _logger;
}

export function getLogger(): pino.Logger {
  if (!_logger) {
    throw new Error('Logger not initialized. Call createLogger() first.');
  }
  return _logger;
}
