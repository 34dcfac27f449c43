import pino, { type Logger, type DestinationStream, type LoggerOptions } from 'pino';

const REDACT_PATHS = [
  'token',
  'password',
  'credentials.password',
  'authorization',
  'headers.authorization',
  'request.headers.authorization',
];

const DEFAULT_LEVEL = 'info';

/** Unknown level names fall back to `info`; config validation reports them. */
export function resolveLevel(level: string | undefined): string {
  if (level === undefined) return DEFAULT_LEVEL;
  return level === 'silent' || level in pino.levels.values ? level : DEFAULT_LEVEL;
}

export function createRootLogger(destination?: DestinationStream, level?: string): Logger {
  const options: LoggerOptions = {
    level: resolveLevel(level ?? process.env.LOG_LEVEL),
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

let root: Logger | null = null;

/** Child of the process-wide logger, created on first use. */
export function createLogger(context: Record<string, unknown>): Logger {
  root ??= createRootLogger();
  return root.child(context);
}

export type { Logger };
