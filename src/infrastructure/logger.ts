import pino from 'pino';
import { config } from '../config/env';

export const LOG_REDACT = ['req.headers.authorization', 'req.headers.cookie'];

export function prettyTransport() {
  return config.NODE_ENV === 'development'
    ? {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      }
    : undefined;
}

// Used outside of a request: import service defaults, scripts, the pg query listener.
// Request handlers pass `request.log` instead.
export const logger = pino({
  level: config.LOG_LEVEL,
  transport: prettyTransport(),
  redact: LOG_REDACT,
});

type LogFn = (obj: object, msg?: string) => void;

export type AppLogger = {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
};
