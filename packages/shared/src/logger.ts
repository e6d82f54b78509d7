import pino from 'pino';

export interface LoggerOptions {
  /** Human-readable output through pino-pretty. Defaults to on outside production. */
  pretty?: boolean;
}

/** Pretty output goes to stderr so the CLI's own summary on stdout stays clean. */
export function createLogger(name: string, level = 'info', options: LoggerOptions = {}) {
  const pretty = options.pretty ?? process.env.NODE_ENV !== 'production';
  return pino({
    name,
    level,
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: { colorize: true, destination: 2, ignore: 'pid,hostname', translateTime: 'HH:MM:ss' },
        }
      : undefined,
  });
}

export type Logger = pino.Logger;

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
