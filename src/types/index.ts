import type { z } from 'zod';
import type {
  appConfigSchema,
  daemonSettingsSchema,
  environmentRecordSchema,
  globalDefaultsSchema,
  localConfigSchema,
  portRangeSchema,
} from './schemas.js';

export type PortRange = z.infer<typeof portRangeSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;
export type GlobalDefaults = z.infer<typeof globalDefaultsSchema>;
export type EnvironmentRecord = z.infer<typeof environmentRecordSchema>;
export type LocalConfig = z.infer<typeof localConfigSchema>;

export type Registry = Record<string, EnvironmentRecord>;

export type DaemonSettingsInput = z.infer<typeof daemonSettingsSchema>;

export interface DaemonSettings {
  binaryName: string;
  releaseRepo: string;
  apiBaseUrl: string;
  downloadBaseUrl: string;
}

/**
 * Locations owned by the tool itself, independent of any environment.
 */
export interface BoxenvHome {
  root: string;
  configPath: string;
  defaultsPath: string;
  registryPath: string;
  cacheDir: string;
  /** Well-known config location the daemon always reads, whatever flags it gets. */
  daemonGlobalConfigPath: string;
}

export interface EnvironmentPaths {
  root: string;
  stateDir: string;
  configPath: string;
  pidPath: string;
  logPath: string;
  markerPath: string;
}

export type HostOs = 'linux' | 'darwin' | 'windows';
export type HostArch = 'amd64' | 'arm64';

export interface HostPlatform {
  os: HostOs;
  arch: HostArch;
}

export interface BinaryBuildInfo {
  name: string;
  version: string;
  commit?: string;
  toolchain?: string;
  os?: string;
  arch?: string;
  builtAt?: string;
}

export type BinarySpec =
  | { kind: 'version'; version: string }
  | { kind: 'path'; value: string };

export type BinarySource = 'cache' | 'download' | 'path' | 'search-path' | 'unresolved';

export interface ResolvedBinary {
  path: string;
  source: BinarySource;
  version?: string;
  build?: BinaryBuildInfo;
  hash?: string;
}

export interface EnvironmentMarker {
  email: string;
  port: number;
  serverUrl: string;
  binary?: {
    path?: string;
    version?: string;
    hash?: string;
  };
  createdAt: string;
}

export type HealthResult =
  | { state: 'healthy'; url: string; status: number }
  | { state: 'unhealthy'; url: string; status: number }
  | { state: 'unreachable'; url: string; error: string };

export type PidCheck =
  | { state: 'absent' }
  | { state: 'running'; pid: number }
  | { state: 'stale'; pid: number };

export interface ProcessEntry {
  pid: number;
  command: string;
}

/**
 * Everything the supervisor needs to act on one environment's daemon.
 */
export interface DaemonTarget {
  paths: EnvironmentPaths;
  config: LocalConfig;
  /** Port recorded in the registry, 0 when unassigned. */
  registryPort: number;
  daemonGlobalConfigPath: string;
}
