import { realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { readJsonDocument, writeJsonDocument } from './configStore.js';
import { registrySchema } from '../types/schemas.js';
import type { BoxenvHome, EnvironmentRecord, Registry } from '../types/index.js';

/**
 * Resolves symlinks and relative segments. A path that does not exist yet
 * falls back to its plain absolute form so the key stays reproducible.
 */
export function canonicalPath(path: string): string {
  const absolute = resolve(path);
  try {
    return realpathSync(absolute);
  } catch {
    return absolute;
  }
}

export function environmentKey(path: string, email: string): string {
  return `${email}@${canonicalPath(path)}`;
}

export function loadRegistry(home: BoxenvHome): Registry {
  return readJsonDocument(home.registryPath, registrySchema, {});
}

export function saveRegistry(home: BoxenvHome, registry: Registry): void {
  writeJsonDocument(home.registryPath, registry);
}

export interface RegistrationUpdate {
  email: string;
  name?: string;
  port?: number;
  serverUrl?: string;
  devMode?: boolean;
  binary?: string;
  binaryVersion?: string;
  binaryHash?: string;
  binaryOs?: string;
  binaryArch?: string;
  /** Drops every recorded binary field before applying the update. */
  clearBinary?: boolean;
}

const BINARY_FIELDS = ['binary', 'binaryVersion', 'binaryHash', 'binaryOs', 'binaryArch'] as const;

function mergeRecord(
  existing: EnvironmentRecord | undefined,
  path: string,
  update: RegistrationUpdate,
  now: string,
): EnvironmentRecord {
  const record: EnvironmentRecord = {
    path,
    email: update.email,
    port: update.port || existing?.port || 0,
    name: update.name ?? existing?.name ?? defaultName(path),
    serverUrl: update.serverUrl ?? existing?.serverUrl ?? '',
    devMode: update.devMode ?? existing?.devMode ?? false,
    createdAt: existing?.createdAt ?? now,
    updatedAt: now,
  };

  if (existing && !update.clearBinary) {
    for (const field of BINARY_FIELDS) {
      const value = existing[field];
      if (value !== undefined) record[field] = value;
    }
  }

  if (update.binary !== undefined) {
    // a new concrete path invalidates metadata that described the old one
    for (const field of BINARY_FIELDS) delete record[field];
    record.binary = update.binary;
  }
  if (update.binaryVersion !== undefined) record.binaryVersion = update.binaryVersion;
  if (update.binaryHash !== undefined) record.binaryHash = update.binaryHash;
  if (update.binaryOs !== undefined) record.binaryOs = update.binaryOs;
  if (update.binaryArch !== undefined) record.binaryArch = update.binaryArch;

  return record;
}

function defaultName(path: string): string {
  const segments = path.split(/[\\/]/).filter(Boolean);
  return segments[segments.length - 1] ?? path;
}

/**
 * Upserts the record for (`path`, `update.email`) and returns the new registry.
 * Fields missing from `update` keep their recorded values; in particular a
 * recorded binary path survives edits that only touch connection settings.
 */
export function registerEnvironment(
  registry: Registry,
  path: string,
  update: RegistrationUpdate,
  now: Date = new Date(),
): { registry: Registry; key: string; record: EnvironmentRecord } {
  const canonical = canonicalPath(path);
  const key = environmentKey(canonical, update.email);
  const record = mergeRecord(registry[key], canonical, update, now.toISOString());
  return { registry: { ...registry, [key]: record }, key, record };
}

/**
 * Removes every record stored for `path`, whichever principal owns it.
 */
export function unregisterEnvironment(
  registry: Registry,
  path: string,
): { registry: Registry; removed: EnvironmentRecord[] } {
  const canonical = canonicalPath(path);
  const next: Registry = {};
  const removed: EnvironmentRecord[] = [];
  for (const [key, record] of Object.entries(registry)) {
    if (canonicalPath(record.path) === canonical) {
      removed.push(record);
    } else {
      next[key] = record;
    }
  }
  return { registry: next, removed };
}

export function findEnvironment(registry: Registry, path: string): EnvironmentRecord | undefined {
  const canonical = canonicalPath(path);
  return Object.values(registry).find((record) => canonicalPath(record.path) === canonical);
}

export function listEnvironments(registry: Registry): EnvironmentRecord[] {
  return Object.values(registry).sort((a, b) => a.path.localeCompare(b.path));
}

export function usedPorts(registry: Registry): Set<number> {
  return new Set(
    Object.values(registry)
      .map((record) => record.port)
      .filter((port) => port > 0),
  );
}
