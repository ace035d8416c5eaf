import pino from 'pino';
import path from 'path';
import { type LoggingConfig, loadLoggingConfig } from '../config';

export function buildLogger(settings: LoggingConfig): pino.Logger {
  if (settings.env === 'test') {
    return pino({ level: 'silent' });
  }

  const isDev = settings.env === 'development';
  const targets: pino.TransportTargetOptions[] = [
    isDev
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
          level: settings.level,
        }
      : {
          target: 'pino/file',
          options: { destination: 1 },
          level: settings.level,
        },
    {
      target: 'pino/file',
      options: {
        destination: path.join(settings.logsDir, 'app.log'),
        mkdir: true,
      },
      level: 'info',
    },
    {
      target: 'pino/file',
      options: {
        destination: path.join(settings.logsDir, 'error.log'),
        mkdir: true,
      },
      level: 'error',
    },
  ];

  return pino({
    level: settings.level,
    transport: { targets },
    serializers: {
      err: pino.stdSerializers.err,
      req: pino.stdSerializers.req,
      res: pino.stdSerializers.res,
    },
    base: {
      service: 'license-server',
    },
  });
}

export const logger = buildLogger(loadLoggingConfig());

export type Logger = pino.Logger;

export function createChildLogger(name: string): Logger {
  return logger.child({ module: name });
}
