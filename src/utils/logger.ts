import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const TAGS: Record<LogLevel, string> = {
  debug: pc.gray('[debug]'),
  info: pc.blue('[info]'),
  warn: pc.yellow('[warn]'),
  error: pc.red('[error]'),
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

let threshold: LogLevel = isLogLevel(process.env.BOXENV_LOG_LEVEL) ? process.env.BOXENV_LOG_LEVEL : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function write(level: LogLevel, message: string): void {
  if (LEVELS[level] < LEVELS[threshold]) return;
  // stdout is reserved for command output (e.g. `eval "$(boxenv activate)"`)
  console.error(`${TAGS[level]} ${message}`);
}

export const log: Logger = {
  debug: (message) => write('debug', message),
  info: (message) => write('info', message),
  warn: (message) => write('warn', message),
  error: (message) => write('error', message),
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
