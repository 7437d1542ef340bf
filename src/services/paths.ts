import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { ConfigurationError } from '../errors.js';
import type { AppConfig, BoxenvHome, DaemonSettings, EnvironmentPaths } from '../types/index.js';

export const STATE_DIR_NAME = '.boxenv';
export const MARKER_FILE_NAME = '.boxenv.json';

export const DEFAULT_DAEMON_SETTINGS: DaemonSettings = {
  binaryName: 'syftbox',
  releaseRepo: 'OpenMined/syftbox',
  apiBaseUrl: 'https://api.github.com',
  downloadBaseUrl: 'https://github.com',
};

type Env = Record<string, string | undefined>;

/**
 * Locations owned by the tool. `BOXENV_HOME` moves the tool home and
 * `BOXENV_DAEMON_GLOBAL_CONFIG` moves the daemon's well-known config slot.
 */
export function resolveHome(env: Env = process.env, binaryName = DEFAULT_DAEMON_SETTINGS.binaryName): BoxenvHome {
  const root = env.BOXENV_HOME ? resolve(env.BOXENV_HOME) : join(homedir(), STATE_DIR_NAME);
  return {
    root,
    configPath: join(root, 'config.json'),
    defaultsPath: join(root, 'defaults.json'),
    registryPath: join(root, 'registry.json'),
    cacheDir: join(root, 'cache'),
    daemonGlobalConfigPath: env.BOXENV_DAEMON_GLOBAL_CONFIG
      ? resolve(env.BOXENV_DAEMON_GLOBAL_CONFIG)
      : join(homedir(), `.${binaryName}`, 'config.json'),
  };
}

export function resolveDaemonSettings(config: AppConfig): DaemonSettings {
  const daemon = config.daemon ?? {};
  return {
    binaryName: daemon.binaryName ?? DEFAULT_DAEMON_SETTINGS.binaryName,
    releaseRepo: daemon.releaseRepo ?? DEFAULT_DAEMON_SETTINGS.releaseRepo,
    apiBaseUrl: daemon.apiBaseUrl ?? DEFAULT_DAEMON_SETTINGS.apiBaseUrl,
    downloadBaseUrl: daemon.downloadBaseUrl ?? DEFAULT_DAEMON_SETTINGS.downloadBaseUrl,
  };
}

export function environmentPaths(root: string): EnvironmentPaths {
  const absolute = resolve(root);
  const stateDir = join(absolute, STATE_DIR_NAME);
  return {
    root: absolute,
    stateDir,
    configPath: join(stateDir, 'config.json'),
    pidPath: join(stateDir, 'daemon.pid'),
    logPath: join(stateDir, 'logs', 'daemon.log'),
    markerPath: join(absolute, MARKER_FILE_NAME),
  };
}

export function isEnvironmentRoot(dir: string): boolean {
  return existsSync(environmentPaths(dir).configPath);
}

/**
 * Walks up from `start` until a directory holding an environment config is found.
 */
export function findEnvironmentRoot(start: string): string {
  let dir = resolve(start);
  for (;;) {
    if (isEnvironmentRoot(dir)) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw new ConfigurationError(resolve(start), 'No boxenv environment found here or in any parent directory');
    }
    dir = parent;
  }
}
