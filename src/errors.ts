export type BoxenvErrorKind = 'configuration' | 'resolution' | 'allocation' | 'lifecycle';

export class BoxenvError extends Error {
  readonly kind: BoxenvErrorKind;
  readonly cause?: unknown;

  constructor(kind: BoxenvErrorKind, message: string, cause?: unknown) {
    super(message);
    this.name = 'BoxenvError';
    this.kind = kind;
    this.cause = cause;
  }
}

/**
 * Missing or unreadable configuration. Always names the path it tried.
 */
export class ConfigurationError extends BoxenvError {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super('configuration', `${message} (${path})`, cause);
    this.name = 'ConfigurationError';
    this.path = path;
  }
}

export interface ResolutionAttempt {
  source: string;
  error: string;
}

export class BinaryResolutionError extends BoxenvError {
  readonly attempts: ResolutionAttempt[];

  constructor(message: string, attempts: ResolutionAttempt[] = []) {
    const detail = attempts.map((a) => `\n  - ${a.source}: ${a.error}`).join('');
    super('resolution', `${message}${detail}`);
    this.name = 'BinaryResolutionError';
    this.attempts = attempts;
  }
}

export class PortRangeExhaustedError extends BoxenvError {
  readonly min: number;
  readonly max: number;

  constructor(min: number, max: number) {
    super('allocation', `Port range ${min}-${max} exhausted`);
    this.name = 'PortRangeExhaustedError';
    this.min = min;
    this.max = max;
  }
}

export class DaemonStartError extends BoxenvError {
  readonly logPath: string;

  constructor(logPath: string, cause?: unknown) {
    super('lifecycle', `Daemon failed to start; see ${logPath}`, cause);
    this.name = 'DaemonStartError';
    this.logPath = logPath;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** The `code` of a Node system error, such as `ESRCH` or `EPERM`. */
export function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}
