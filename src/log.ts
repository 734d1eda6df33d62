import pino from 'pino';
import { getEnv } from './env';

const env = getEnv();

function resolveLevel(): string {
  if (env.NODE_ENV === 'test') return 'silent';
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export const logger = pino({
  level: resolveLevel(),
  transport:
    env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export interface RequestLog {
  id: string;
  method: string;
  path: string;
  bytesIn: number;
  ms: number;
}

export function logRequest(log: RequestLog): void {
  logger.info(log, 'captured request');
}
