import { createLogger, format, transports } from 'winston';
import type { Logger } from 'winston';

export type { Logger } from 'winston';

export interface EngineLoggerOptions {
  level?: string;
  /** Drop every entry; used by tests and embedders that bring their own sink. */
  silent?: boolean;
  /** Also append JSON lines to this file. */
  filename?: string;
}

const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/**
 * Application logger. Console output goes to stderr so that stdout stays free
 * for the CLI's JSONL event stream.
 */
export function createEngineLogger(options: EngineLoggerOptions = {}): Logger {
  const stderr = new transports.Console({
    stderrLevels: ALL_LEVELS,
    format: format.combine(
      format.colorize(),
      format.printf(({ level, message, timestamp, profile }) => {
        const scope = typeof profile === 'string' ? ` [${profile}]` : '';
        return `${String(timestamp)} ${level}${scope}: ${String(message)}`;
      }),
    ),
  });
  const file = options.filename
    ? [new transports.File({ filename: options.filename, format: format.json() })]
    : [];

  return createLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    format: format.combine(format.timestamp(), format.errors({ stack: true })),
    transports: [stderr, ...file],
  });
}

/** Logger scoped to one browser profile / account. */
export function profileLogger(logger: Logger, profile: string): Logger {
  return logger.child({ profile });
}
