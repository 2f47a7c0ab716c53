import pino from 'pino';

// stdout carries command output (CSV, JSON), so logs go to stderr
const STDERR = 2;

export function createLogger(verbose = false): Logger {
  const level = verbose ? 'debug' : 'info';

  if (process.env.NODE_ENV === 'production') {
    return pino({ level }, pino.destination(STDERR));
  }

  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname',
        destination: STDERR,
      },
    },
  });
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

export type Logger = pino.Logger;
