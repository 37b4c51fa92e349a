import { pino, type Logger, type LoggerOptions } from 'pino';

export function loggerOptions(level: string): LoggerOptions {
  return {
    level,
    name: 'retail-assistant',
    redact: ['req.headers.authorization'],
  };
}

// for code running outside a request (startup, scripts, tests)
export function createLogger(level: string = 'info'): Logger {
  return pino(loggerOptions(level));
}
