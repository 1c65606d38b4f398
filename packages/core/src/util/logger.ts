export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  readonly level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export type LogWriter = (line: string) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

const stderrWriter: LogWriter = (line) => {
  process.stderr.write(line);
};

export function isLogLevel(value: unknown): value is LogLevel {
  return (
    typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value)
  );
}

/**
 * Level from NSMAP_LOG_LEVEL, falling back to 'warn' when unset or unknown.
 */
export function logLevelFromEnv(
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  const raw = env.NSMAP_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'warn';
}

/**
 * Lines are written as `[nsmap] <level>: <message>` to stderr unless a
 * writer is supplied.
 */
export function createLogger(
  level: LogLevel = 'warn',
  write: LogWriter = stderrWriter
): Logger {
  const emit = (at: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (LEVEL_RANK[at] > LEVEL_RANK[level]) return;
    write(`[nsmap] ${at}: ${message}\n`);
  };
  return {
    level,
    error: (message) => emit('error', message),
    warn: (message) => emit('warn', message),
    info: (message) => emit('info', message),
    debug: (message) => emit('debug', message),
  };
}

export const silentLogger: Logger = createLogger('silent');
