export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export interface Logger {
  readonly scope: string;
  readonly level: LogLevel;
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

export type LogSink = Pick<Console, 'error' | 'warn' | 'info' | 'debug'>;

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);

const rank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

export const createLogger = (
  scope: string,
  level: LogLevel = 'info',
  sink: LogSink = console,
): Logger => {
  const enabled = (messageLevel: Exclude<LogLevel, 'silent'>) => rank(messageLevel) <= rank(level);
  const prefix = `[${scope}]`;
  return {
    scope,
    level,
    error: (message, ...details) => {
      if (enabled('error')) sink.error(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) sink.warn(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) sink.info(`${prefix} ${message}`, ...details);
    },
    debug: (message, ...details) => {
      if (enabled('debug')) sink.debug(`${prefix} ${message}`, ...details);
    },
  };
};
