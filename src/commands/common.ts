import { resolve } from 'node:path';
import { findEnvironmentRoot } from '../services/paths.js';
import type { BoxenvContext } from '../services/context.js';

export type ContextFactory = () => BoxenvContext;

export interface PathOption {
  path?: string;
}

/**
 * The environment a command acts on: `--path` when given, otherwise the
 * nearest enclosing environment of the working directory.
 */
export function resolveRoot(options: PathOption): string {
  return options.path ? resolve(options.path) : findEnvironmentRoot(process.cwd());
}

export function parseLineCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive number of lines, got "${value}"`);
  }
  return parsed;
}

export function parsePort(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
    throw new Error(`Invalid port "${value}"`);
  }
  return parsed;
}
