import { randomBytes } from 'node:crypto';
import { existsSync, mkdirSync, rmSync } from 'node:fs';
import { ConfigurationError } from '../errors.js';
import { classifyBinarySpec } from './binaryResolver.js';
import {
  hasLocalConfig,
  loadGlobalDefaults,
  loadLocalConfig,
  saveGlobalDefaults,
  saveLocalConfig,
  writeMarkerOnce,
} from './configStore.js';
import { allocatePort } from './portAllocator.js';
import { environmentPaths } from './paths.js';
import {
  canonicalPath,
  findEnvironment,
  listEnvironments,
  loadRegistry,
  registerEnvironment,
  saveRegistry,
  unregisterEnvironment,
  type RegistrationUpdate,
} from './registry.js';
import type { BoxenvContext } from './context.js';
import type { StartResult, StatusReport, StopResult } from './daemonSupervisor.js';
import type {
  DaemonTarget,
  EnvironmentRecord,
  LocalConfig,
  PidCheck,
  ResolvedBinary,
} from '../types/index.js';

export const DEFAULT_SERVER_URL = 'https://syftbox.net';

const EMAIL = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;

export interface InitOptions {
  root: string;
  email: string;
  serverUrl?: string;
  devMode?: boolean;
  name?: string;
  binary?: string;
  /** Re-initialise a root that already has a config. */
  force?: boolean;
}

export interface EditOptions {
  serverUrl?: string;
  devMode?: boolean;
  name?: string;
  binary?: string;
  clearBinary?: boolean;
}

function assertEmail(email: string, root: string): void {
  if (!EMAIL.test(email)) {
    throw new ConfigurationError(root, `"${email}" is not a valid email address`);
  }
}

function portFromUrl(url: string | undefined): number {
  if (!url) return 0;
  try {
    return Number(new URL(url).port) || 0;
  } catch {
    return 0;
  }
}

/**
 * Registry fields describing an explicitly chosen binary. A version pin is
 * stored as a version only, so a cleared cache is re-filled from it rather
 * than pointing at a missing file.
 */
function binaryUpdate(ctx: BoxenvContext, spec: string, resolved: ResolvedBinary): Omit<RegistrationUpdate, 'email'> {
  const parsed = classifyBinarySpec(spec);
  const update: Omit<RegistrationUpdate, 'email'> = {
    clearBinary: true,
    binaryOs: resolved.build?.os ?? ctx.platform.os,
    binaryArch: resolved.build?.arch ?? ctx.platform.arch,
  };
  if (parsed.kind === 'version') {
    update.binaryVersion = resolved.version ?? parsed.version;
  } else {
    update.binary = resolved.path;
    if (resolved.version) update.binaryVersion = resolved.version;
  }
  if (resolved.hash) update.binaryHash = resolved.hash;
  return update;
}

export async function initEnvironment(ctx: BoxenvContext, options: InitOptions): Promise<EnvironmentRecord> {
  const paths = environmentPaths(options.root);
  assertEmail(options.email, paths.root);

  let previous: LocalConfig | undefined;
  if (hasLocalConfig(paths.configPath)) {
    if (!options.force) {
      throw new ConfigurationError(paths.configPath, 'Environment already initialised; use --force to overwrite');
    }
    previous = loadLocalConfig(paths.configPath);
  }

  // resolve before touching the root so a failed install leaves nothing behind
  const resolved = options.binary ? await ctx.resolver.resolve(options.binary) : undefined;

  let registry = loadRegistry(ctx.home);
  const existing = findEnvironment(registry, paths.root);
  const port = existing?.port || allocatePort(registry, ctx.ports);
  const serverUrl = options.serverUrl ?? DEFAULT_SERVER_URL;
  const devMode = options.devMode ?? false;

  // one root has one principal: records left by a previous principal go
  const canonical = canonicalPath(paths.root);
  registry = Object.fromEntries(
    Object.entries(registry).filter(
      ([, record]) => canonicalPath(record.path) !== canonical || record.email === options.email,
    ),
  );

  mkdirSync(paths.stateDir, { recursive: true });
  const config: LocalConfig = {
    email: options.email,
    data_dir: paths.root,
    server_url: serverUrl,
    client_url: `http://127.0.0.1:${port}`,
    client_token: randomBytes(16).toString('hex'),
    dev_mode: devMode,
  };
  // a re-init keeps the login the daemon already holds for the same principal
  if (previous?.refresh_token && previous.email === options.email) {
    config.refresh_token = previous.refresh_token;
  }
  saveLocalConfig(paths.configPath, config);

  let update: RegistrationUpdate = { email: options.email, name: options.name, port, serverUrl, devMode };
  if (options.binary && resolved) {
    update = { ...update, ...binaryUpdate(ctx, options.binary, resolved) };
  }

  const registered = registerEnvironment(registry, paths.root, update);
  registry = registered.registry;
  saveRegistry(ctx.home, registry);

  const { record } = registered;
  const wroteMarker = writeMarkerOnce(paths.markerPath, {
    email: record.email,
    port: record.port,
    serverUrl: record.serverUrl,
    ...(record.binary || record.binaryVersion
      ? { binary: { path: record.binary, version: record.binaryVersion, hash: record.binaryHash } }
      : {}),
    createdAt: record.createdAt ?? new Date().toISOString(),
  });
  if (!wroteMarker) {
    ctx.log.debug(`Keeping existing marker ${paths.markerPath}`);
  }

  ctx.log.info(`Initialised ${record.name} for ${record.email} on port ${record.port}`);
  return record;
}

/**
 * Applies connection or binary changes. Binary fields not mentioned are kept.
 */
export async function editEnvironment(ctx: BoxenvContext, root: string, changes: EditOptions): Promise<EnvironmentRecord> {
  const paths = environmentPaths(root);
  const config = loadLocalConfig(paths.configPath);

  if (changes.serverUrl !== undefined) config.server_url = changes.serverUrl;
  if (changes.devMode !== undefined) config.dev_mode = changes.devMode;
  saveLocalConfig(paths.configPath, config);

  const registry = loadRegistry(ctx.home);
  const existing = findEnvironment(registry, paths.root);
  let update: RegistrationUpdate = {
    email: config.email,
    name: changes.name,
    serverUrl: config.server_url,
    devMode: config.dev_mode ?? false,
    port: existing?.port || portFromUrl(config.client_url) || allocatePort(registry, ctx.ports),
  };

  if (changes.binary) {
    const resolved = await ctx.resolver.resolve(changes.binary);
    update = { ...update, ...binaryUpdate(ctx, changes.binary, resolved) };
  } else if (changes.clearBinary) {
    update.clearBinary = true;
  }

  const registered = registerEnvironment(registry, paths.root, update);
  saveRegistry(ctx.home, registered.registry);
  return registered.record;
}

export interface RemoveOptions {
  /** Also delete the environment's state directory and marker. */
  purge?: boolean;
}

export async function removeEnvironment(
  ctx: BoxenvContext,
  root: string,
  options: RemoveOptions = {},
): Promise<EnvironmentRecord[]> {
  const paths = environmentPaths(root);

  if (hasLocalConfig(paths.configPath)) {
    const stopped = await ctx.supervisor.stop(environmentTarget(ctx, paths.root));
    if (stopped.status === 'stopped') {
      ctx.log.info(`Stopped daemon ${stopped.pid}`);
    }
  }

  const { registry, removed } = unregisterEnvironment(loadRegistry(ctx.home), paths.root);
  saveRegistry(ctx.home, registry);

  if (options.purge) {
    rmSync(paths.stateDir, { recursive: true, force: true });
    rmSync(paths.markerPath, { force: true });
  }
  return removed;
}

export function getEnvironment(ctx: BoxenvContext, root: string): EnvironmentRecord | undefined {
  return findEnvironment(loadRegistry(ctx.home), root);
}

export interface EnvironmentListing {
  record: EnvironmentRecord;
  process: PidCheck | { state: 'missing' };
}

export function listEnvironmentStates(ctx: BoxenvContext): EnvironmentListing[] {
  return listEnvironments(loadRegistry(ctx.home)).map((record) => {
    const paths = environmentPaths(record.path);
    if (!hasLocalConfig(paths.configPath)) {
      return { record, process: { state: 'missing' } };
    }
    return { record, process: ctx.supervisor.checkPid(environmentTarget(ctx, record.path)) };
  });
}

export function getGlobalDefault(ctx: BoxenvContext): string | undefined {
  return loadGlobalDefaults(ctx.home).binary;
}

export function setGlobalDefault(ctx: BoxenvContext, spec: string | undefined): void {
  saveGlobalDefaults(ctx.home, spec ? { binary: spec } : {});
}

export interface ResolveOptions {
  spec?: string;
  /** Record the result on the environment. */
  save?: boolean;
}

export async function resolveEnvironmentBinary(
  ctx: BoxenvContext,
  root: string,
  options: ResolveOptions = {},
): Promise<ResolvedBinary> {
  const registry = loadRegistry(ctx.home);
  const record = findEnvironment(registry, root);
  const resolved = await ctx.resolver.resolveForEnvironment(record, loadGlobalDefaults(ctx.home), options.spec);

  if (options.save && options.spec && record) {
    const registered = registerEnvironment(registry, record.path, {
      email: record.email,
      ...binaryUpdate(ctx, options.spec, resolved),
    });
    saveRegistry(ctx.home, registered.registry);
  }
  return resolved;
}

export function environmentTarget(ctx: BoxenvContext, root: string): DaemonTarget {
  const paths = environmentPaths(root);
  const config = loadLocalConfig(paths.configPath);
  const record = findEnvironment(loadRegistry(ctx.home), paths.root);
  return {
    paths,
    config,
    registryPort: record?.port ?? 0,
    daemonGlobalConfigPath: ctx.home.daemonGlobalConfigPath,
  };
}

export async function startEnvironment(
  ctx: BoxenvContext,
  root: string,
  options: { force?: boolean; binary?: string } = {},
): Promise<StartResult> {
  const target = environmentTarget(ctx, root);
  const resolved = await resolveEnvironmentBinary(ctx, root, { spec: options.binary });
  ctx.log.debug(`Using ${resolved.path} (${resolved.source})`);
  return ctx.supervisor.start(target, { binary: resolved.path, force: options.force });
}

export async function stopEnvironment(ctx: BoxenvContext, root: string): Promise<StopResult> {
  return ctx.supervisor.stop(environmentTarget(ctx, root));
}

export async function restartEnvironment(
  ctx: BoxenvContext,
  root: string,
  options: { binary?: string } = {},
): Promise<StartResult> {
  const target = environmentTarget(ctx, root);
  const resolved = await resolveEnvironmentBinary(ctx, root, { spec: options.binary });
  return ctx.supervisor.restart(target, { binary: resolved.path });
}

export async function environmentStatus(ctx: BoxenvContext, root: string): Promise<StatusReport> {
  return ctx.supervisor.status(environmentTarget(ctx, root));
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function daemonEnvPrefix(ctx: BoxenvContext): string {
  return ctx.daemon.binaryName.toUpperCase().replace(/[^A-Z0-9]/g, '_');
}

/**
 * `export` lines for `eval "$(boxenv activate)"`.
 */
export function activationScript(ctx: BoxenvContext, root: string): string {
  const paths = environmentPaths(root);
  const config = loadLocalConfig(paths.configPath);
  const record = findEnvironment(loadRegistry(ctx.home), paths.root);
  const prefix = daemonEnvPrefix(ctx);
  const vars: Array<[string, string]> = [
    ['BOXENV_ACTIVE', record?.name ?? canonicalPath(paths.root)],
    ['BOXENV_ROOT', paths.root],
    [`${prefix}_CONFIG_PATH`, paths.configPath],
    [`${prefix}_EMAIL`, config.email],
  ];
  return vars.map(([key, value]) => `export ${key}=${shellQuote(value)}`).join('\n');
}

export function deactivationScript(ctx: BoxenvContext): string {
  const prefix = daemonEnvPrefix(ctx);
  return `unset BOXENV_ACTIVE BOXENV_ROOT ${prefix}_CONFIG_PATH ${prefix}_EMAIL`;
}

export function environmentExists(root: string): boolean {
  return existsSync(environmentPaths(root).configPath);
}
