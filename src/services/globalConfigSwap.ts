import { copyFileSync, existsSync, renameSync, rmSync } from 'node:fs';
import { errorMessage } from '../errors.js';
import { loadLocalConfig, restoreOwnedFields, saveLocalConfig } from './configStore.js';
import { canonicalPath } from './registry.js';
import type { LocalConfig } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

/*
 * The daemon reads its well-known global config for some operations even when
 * told to use another file. Around a spawn, the real global file is moved
 * aside and the environment's config put in its place; release puts the
 * original back and repairs the environment's config, which the daemon may
 * have rewritten in the meantime.
 */

export interface GlobalConfigSwapOptions {
  globalConfigPath: string;
  localConfigPath: string;
  log: Logger;
}

export interface GlobalConfigSwap {
  readonly options: GlobalConfigSwapOptions;
  readonly asidePath: string;
  /** Present only when a swap actually happened. */
  readonly localBackup?: LocalConfig;
  released: boolean;
}

export function asidePathFor(globalConfigPath: string): string {
  return `${globalConfigPath}.boxenv-aside`;
}

/**
 * Puts back a global config left aside by a run that died mid-swap.
 */
export function recoverInterruptedSwap(globalConfigPath: string, log: Logger): boolean {
  const asidePath = asidePathFor(globalConfigPath);
  if (!existsSync(asidePath)) {
    return false;
  }
  rmSync(globalConfigPath, { force: true });
  renameSync(asidePath, globalConfigPath);
  log.warn(`Restored ${globalConfigPath} left aside by an interrupted start`);
  return true;
}

export function acquireGlobalConfigSwap(options: GlobalConfigSwapOptions): GlobalConfigSwap {
  const { globalConfigPath, localConfigPath, log } = options;
  const asidePath = asidePathFor(globalConfigPath);
  recoverInterruptedSwap(globalConfigPath, log);

  if (!existsSync(globalConfigPath) || canonicalPath(globalConfigPath) === canonicalPath(localConfigPath)) {
    return { options, asidePath, released: false };
  }

  const localBackup = loadLocalConfig(localConfigPath);
  renameSync(globalConfigPath, asidePath);
  try {
    copyFileSync(localConfigPath, globalConfigPath);
  } catch (error) {
    renameSync(asidePath, globalConfigPath);
    throw error;
  }

  log.debug(`Swapped ${localConfigPath} into ${globalConfigPath}`);
  return { options, asidePath, localBackup, released: false };
}

function readQuietly(path: string, log: Logger): LocalConfig | undefined {
  if (!existsSync(path)) return undefined;
  try {
    return loadLocalConfig(path);
  } catch (error) {
    log.debug(`Ignoring unreadable ${path}: ${errorMessage(error)}`);
    return undefined;
  }
}

export function releaseGlobalConfigSwap(swap: GlobalConfigSwap): void {
  if (swap.released || !swap.localBackup) {
    swap.released = true;
    return;
  }
  swap.released = true;

  const { globalConfigPath, localConfigPath, log } = swap.options;
  const slotCopy = readQuietly(globalConfigPath, log);

  try {
    rmSync(globalConfigPath, { force: true });
    renameSync(swap.asidePath, globalConfigPath);
    log.debug(`Restored original ${globalConfigPath}`);
  } catch (error) {
    // the aside file stays put; the next acquire recovers it
    log.error(`Could not restore ${globalConfigPath} from ${swap.asidePath}: ${errorMessage(error)}`);
  }

  try {
    const restored = restoreOwnedFields(swap.localBackup, readQuietly(localConfigPath, log));
    if (restored.refresh_token === undefined && slotCopy?.refresh_token !== undefined) {
      restored.refresh_token = slotCopy.refresh_token;
    }
    saveLocalConfig(localConfigPath, restored);
  } catch (error) {
    // the global file is already back; a failure here must not hide the caller's own error
    log.warn(`Could not restore ${localConfigPath}: ${errorMessage(error)}`);
  }
}

/**
 * Runs `fn` with the swap in place. The original global config is restored
 * on every exit path, including when `fn` throws.
 */
export async function withGlobalConfigSwap<T>(options: GlobalConfigSwapOptions, fn: () => Promise<T>): Promise<T> {
  const swap = acquireGlobalConfigSwap(options);
  try {
    return await fn();
  } finally {
    releaseGlobalConfigSwap(swap);
  }
}
