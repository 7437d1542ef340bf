import { accessSync, constants, existsSync, statSync } from 'node:fs';
import { delimiter, isAbsolute, join, resolve } from 'node:path';
import { hashFile, probeBinaryVersion } from './versionProbe.js';
import type { BinaryCache } from './binaryCache.js';
import type {
  BinaryBuildInfo,
  BinarySource,
  BinarySpec,
  EnvironmentRecord,
  GlobalDefaults,
  ResolvedBinary,
} from '../types/index.js';
import type { Logger } from '../utils/logger.js';

const SEMVER = /^v?(\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?)$/;

export function classifyBinarySpec(spec: string): BinarySpec {
  const trimmed = spec.trim();
  const match = SEMVER.exec(trimmed);
  if (match) {
    return { kind: 'version', version: match[1] };
  }
  return { kind: 'path', value: trimmed };
}

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export function findOnSearchPath(name: string, env: Record<string, string | undefined> = process.env): string | undefined {
  const dirs = (env.PATH ?? '').split(delimiter).filter(Boolean);
  for (const dir of dirs) {
    const candidate = join(dir, name);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

export interface BinaryResolverDeps {
  cache: BinaryCache;
  binaryName: string;
  log: Logger;
  probe?: (path: string) => Promise<BinaryBuildInfo | undefined>;
  which?: (name: string) => string | undefined;
}

/**
 * Turns a binary spec (a version or a path/name) into something runnable.
 * Path-like specs are never rejected eagerly: a name that cannot be found
 * is passed through and fails when it is executed.
 */
export class BinaryResolver {
  private readonly probe: (path: string) => Promise<BinaryBuildInfo | undefined>;
  private readonly which: (name: string) => string | undefined;

  constructor(private readonly deps: BinaryResolverDeps) {
    this.probe = deps.probe ?? ((path) => probeBinaryVersion(path));
    this.which = deps.which ?? ((name) => findOnSearchPath(name));
  }

  async resolve(spec: string): Promise<ResolvedBinary> {
    const parsed = classifyBinarySpec(spec);

    if (parsed.kind === 'version') {
      const { cache, log } = this.deps;
      if (cache.isCached(parsed.version)) {
        log.debug(`Using cached ${cache.binaryName} ${parsed.version}`);
        return this.describe(cache.executablePath(parsed.version), 'cache', parsed.version);
      }
      log.info(`${cache.binaryName} ${parsed.version} is not cached; installing`);
      const path = await cache.install(parsed.version);
      return this.describe(path, 'download', parsed.version);
    }

    const value = parsed.value;
    if (isAbsolute(value) || existsSync(value)) {
      return this.describe(resolve(value), 'path');
    }

    const found = this.which(value);
    if (found) {
      return this.describe(found, 'search-path');
    }

    this.deps.log.warn(`${value} was not found on PATH; it will be looked up again when the daemon starts`);
    return { path: value, source: 'unresolved' };
  }

  /**
   * Precedence when no spec is given: the environment's recorded path, its
   * pinned version, the global default, PATH, then the bare binary name.
   * A recorded path that has disappeared yields to a recorded version.
   */
  async resolveForEnvironment(
    record: EnvironmentRecord | undefined,
    defaults: GlobalDefaults,
    explicitSpec?: string,
  ): Promise<ResolvedBinary> {
    if (explicitSpec) {
      return this.resolve(explicitSpec);
    }
    if (record?.binary && (existsSync(record.binary) || !record.binaryVersion)) {
      return this.resolve(record.binary);
    }
    if (record?.binaryVersion) {
      return this.resolve(record.binaryVersion);
    }
    if (defaults.binary) {
      return this.resolve(defaults.binary);
    }

    const { binaryName } = this.deps;
    const onPath = this.which(binaryName);
    if (onPath) {
      return this.describe(onPath, 'search-path');
    }
    return { path: binaryName, source: 'unresolved' };
  }

  private async describe(path: string, source: BinarySource, expectedVersion?: string): Promise<ResolvedBinary> {
    const build = await this.probe(path);
    if (build && expectedVersion && build.version !== expectedVersion) {
      this.deps.log.warn(`${path} reports version ${build.version}, expected ${expectedVersion}`);
    }

    const resolved: ResolvedBinary = { path, source };
    const version = build?.version ?? expectedVersion;
    if (version) resolved.version = version;
    if (build) resolved.build = build;
    const hash = hashFile(path);
    if (hash) resolved.hash = hash;
    return resolved;
  }
}
