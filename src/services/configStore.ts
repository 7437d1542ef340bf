import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import writeFileAtomic from 'write-file-atomic';
import type { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { appConfigSchema, globalDefaultsSchema, localConfigSchema } from '../types/schemas.js';
import type {
  AppConfig,
  BoxenvHome,
  EnvironmentMarker,
  GlobalDefaults,
  LocalConfig,
  PortRange,
} from '../types/index.js';

export const DEFAULT_PORT_RANGE: PortRange = { min: 7938, max: 7998 };

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Whole-document load. A missing file yields `fallback`; a file that exists
 * but does not parse or validate is a configuration error.
 */
export function readJsonDocument<T>(path: string, schema: Schema<T>, fallback: T): T {
  if (!existsSync(path)) {
    return fallback;
  }
  return parseJsonDocument(path, schema);
}

function parseJsonDocument<T>(path: string, schema: Schema<T>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(path, 'Unparsable JSON document', error);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(path, `Invalid document: ${issues}`, parsed.error);
  }
  return parsed.data;
}

export function writeJsonDocument(path: string, value: unknown, mode = 0o644): void {
  ensureDir(dirname(path));
  writeFileAtomic.sync(path, JSON.stringify(value, null, 2) + '\n', { mode });
}

export function loadAppConfig(home: BoxenvHome): AppConfig {
  return readJsonDocument(home.configPath, appConfigSchema, {});
}

export function saveAppConfig(home: BoxenvHome, config: AppConfig): void {
  writeJsonDocument(home.configPath, config);
}

export function getPortConfig(home: BoxenvHome): PortRange {
  return loadAppConfig(home).ports ?? DEFAULT_PORT_RANGE;
}

export function setPortConfig(home: BoxenvHome, ports: PortRange): void {
  const config = loadAppConfig(home);
  config.ports = ports;
  saveAppConfig(home, config);
}

export function loadGlobalDefaults(home: BoxenvHome): GlobalDefaults {
  return readJsonDocument(home.defaultsPath, globalDefaultsSchema, {});
}

export function saveGlobalDefaults(home: BoxenvHome, defaults: GlobalDefaults): void {
  writeJsonDocument(home.defaultsPath, defaults);
}

export function hasLocalConfig(path: string): boolean {
  return existsSync(path);
}

export function loadLocalConfig(path: string): LocalConfig {
  if (!existsSync(path)) {
    throw new ConfigurationError(path, 'Environment config not found');
  }
  return parseJsonDocument(path, localConfigSchema);
}

/** Holds a bearer token, so it is written owner-only. */
export function saveLocalConfig(path: string, config: LocalConfig): void {
  writeJsonDocument(path, config, 0o600);
}

/**
 * Writes the discovery marker unless one is already there.
 * Returns whether a file was written.
 */
export function writeMarkerOnce(path: string, marker: EnvironmentMarker): boolean {
  ensureDir(dirname(path));
  try {
    writeFileSync(path, JSON.stringify(marker, null, 2) + '\n', { flag: 'wx' });
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      return false;
    }
    throw error;
  }
}

const OPTIONAL_OWNED_FIELDS = ['client_url', 'client_token', 'dev_mode'] as const;

/**
 * Puts back the fields boxenv writes (identity, paths, URLs, mode, control token)
 * from `backup`, keeping whatever else `current` holds, such as the session
 * credential the daemon stores after login.
 */
export function restoreOwnedFields(backup: LocalConfig, current: LocalConfig | undefined): LocalConfig {
  const restored: LocalConfig = {
    ...current,
    email: backup.email,
    data_dir: backup.data_dir,
    server_url: backup.server_url,
  };

  for (const field of OPTIONAL_OWNED_FIELDS) {
    if (backup[field] === undefined) {
      delete restored[field];
    }
  }
  if (backup.client_url !== undefined) restored.client_url = backup.client_url;
  if (backup.client_token !== undefined) restored.client_token = backup.client_token;
  if (backup.dev_mode !== undefined) restored.dev_mode = backup.dev_mode;

  if (restored.refresh_token === undefined && backup.refresh_token !== undefined) {
    restored.refresh_token = backup.refresh_token;
  }
  return restored;
}
