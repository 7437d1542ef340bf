import { chmodSync, existsSync, mkdirSync, mkdtempSync, readdirSync, renameSync, rmSync, statSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { BinaryResolutionError, errorMessage, type ResolutionAttempt } from '../errors.js';
import { archiveKind, conventionalAssetNames, executableName, selectAsset, type ReleaseAsset } from './releaseAssets.js';
import type { ArchiveExtractor } from '../platform/archiveExtractor.js';
import type { ReleaseClient } from '../platform/releaseClient.js';
import type { HostPlatform } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

export interface BinaryCacheDeps {
  releases: ReleaseClient;
  extractor: ArchiveExtractor;
  platform: HostPlatform;
  log: Logger;
}

function findFile(dir: string, fileName: string): string | undefined {
  const queue = [dir];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const entry of readdirSync(current, { withFileTypes: true })) {
      const full = join(current, entry.name);
      if (entry.isFile() && entry.name === fileName) return full;
      if (entry.isDirectory()) queue.push(full);
    }
  }
  return undefined;
}

/**
 * Per-version store of daemon executables under `<cacheDir>/<version>/`.
 * A version counts as installed only when its executable is present;
 * an empty or half-extracted directory does not.
 */
export class BinaryCache {
  private readonly exeName: string;

  constructor(
    readonly cacheDir: string,
    readonly binaryName: string,
    private readonly deps: BinaryCacheDeps,
  ) {
    this.exeName = executableName(binaryName, deps.platform);
  }

  versionDir(version: string): string {
    return join(this.cacheDir, version);
  }

  executablePath(version: string): string {
    return join(this.versionDir(version), this.exeName);
  }

  isCached(version: string): boolean {
    const exe = this.executablePath(version);
    return existsSync(exe) && statSync(exe).isFile();
  }

  listCachedVersions(): string[] {
    if (!existsSync(this.cacheDir)) return [];
    return readdirSync(this.cacheDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.') && this.isCached(entry.name))
      .map((entry) => entry.name)
      .sort();
  }

  remove(version: string): boolean {
    const dir = this.versionDir(version);
    if (!existsSync(dir)) return false;
    rmSync(dir, { recursive: true, force: true });
    return true;
  }

  /**
   * Returns the cached executable, downloading it first when absent.
   * Tries the release's own asset list, then conventional file names.
   */
  async install(version: string): Promise<string> {
    if (this.isCached(version)) {
      return this.executablePath(version);
    }

    mkdirSync(this.cacheDir, { recursive: true });
    const scratch = mkdtempSync(join(this.cacheDir, '.download-'));
    const attempts: ResolutionAttempt[] = [];

    try {
      const fromRelease = await this.installFromReleaseAssets(version, scratch, attempts);
      if (fromRelease) return fromRelease;

      const { platform, releases, log } = this.deps;
      for (const fileName of conventionalAssetNames(this.binaryName, version, platform)) {
        const url = releases.conventionalAssetUrl(version, fileName);
        try {
          return await this.installFromUrl(url, fileName, version, scratch);
        } catch (error) {
          log.debug(`${url}: ${errorMessage(error)}`);
          attempts.push({ source: url, error: errorMessage(error) });
        }
      }
    } finally {
      rmSync(scratch, { recursive: true, force: true });
    }

    const { os, arch } = this.deps.platform;
    throw new BinaryResolutionError(`No ${this.binaryName} ${version} build could be installed for ${os}/${arch}`, attempts);
  }

  private async installFromReleaseAssets(
    version: string,
    scratch: string,
    attempts: ResolutionAttempt[],
  ): Promise<string | undefined> {
    const { releases, platform, log } = this.deps;
    const source = `release metadata for ${version}`;

    let assets: ReleaseAsset[];
    try {
      assets = await releases.getReleaseAssets(version);
    } catch (error) {
      attempts.push({ source, error: errorMessage(error) });
      return undefined;
    }

    const asset = selectAsset(assets, platform);
    if (!asset) {
      const reason = assets.length === 0 ? 'no release or no assets' : `no asset for ${platform.os}/${platform.arch}`;
      attempts.push({ source, error: reason });
      return undefined;
    }

    log.info(`Downloading ${asset.name}`);
    try {
      return await this.installFromUrl(asset.url, asset.name, version, scratch);
    } catch (error) {
      attempts.push({ source: asset.url, error: errorMessage(error) });
      return undefined;
    }
  }

  private async installFromUrl(url: string, fileName: string, version: string, scratch: string): Promise<string> {
    const workDir = mkdtempSync(join(scratch, 'attempt-'));
    const downloadPath = join(workDir, fileName);
    await this.deps.releases.download(url, downloadPath);

    const kind = archiveKind(fileName);
    let found: string | undefined = downloadPath;
    if (kind !== 'raw') {
      const extractDir = join(workDir, 'extracted');
      await this.deps.extractor.extract(downloadPath, extractDir, kind);
      found = findFile(extractDir, this.exeName);
      if (!found) {
        throw new Error(`${this.exeName} not found inside ${fileName}`);
      }
    }

    const dest = this.executablePath(version);
    mkdirSync(dirname(dest), { recursive: true });
    renameSync(found, dest);
    chmodSync(dest, 0o755);
    return dest;
  }
}
