import { LOG_LEVEL_ENV_VAR } from './constants.js';

export const LogLevels = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LogLevels)[number];

type MessageLevel = Exclude<LogLevel, 'silent'>;

export interface RecorderLogger {
  isEnabled(level: MessageLevel): boolean;
  trace(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  prefix?: string;
}

const LOG_LEVEL_NAMES: readonly string[] = LogLevels;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_NAMES.includes(value);
}

/**
 * Reads the threshold from HTTP_RECORDER_LOG_LEVEL, falling back to `info`.
 */
export function getLogLevelFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const value = env[LOG_LEVEL_ENV_VAR]?.trim().toLowerCase();
  return value && isLogLevel(value) ? value : 'info';
}

export function createConsoleLogger(
  options: ConsoleLoggerOptions = {},
): RecorderLogger {
  const threshold = LogLevels.indexOf(options.level ?? getLogLevelFromEnv());
  const prefix = options.prefix ?? '[http-recorder]';

  const isEnabled = (level: MessageLevel): boolean =>
    LogLevels.indexOf(level) >= threshold;

  const write =
    (level: MessageLevel, sink: (...args: unknown[]) => void) =>
    (message: string, ...details: unknown[]): void => {
      if (isEnabled(level)) {
        sink(`${prefix} ${message}`, ...details);
      }
    };

  return {
    isEnabled,
    trace: write('trace', console.log),
    debug: write('debug', console.log),
    info: write('info', console.log),
    warn: write('warn', console.warn),
    error: write('error', console.error),
  };
}

export const silentLogger: RecorderLogger = createConsoleLogger({
  level: 'silent',
});
