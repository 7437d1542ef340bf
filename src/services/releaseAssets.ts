import type { HostArch, HostOs, HostPlatform } from '../types/index.js';

export type ArchiveKind = 'tar.gz' | 'zip' | 'raw';

export interface ReleaseAsset {
  name: string;
  url: string;
}

const OS_TOKENS: Record<HostOs, string[]> = {
  linux: ['linux'],
  darwin: ['darwin', 'macos', 'osx', 'apple'],
  windows: ['windows', 'win'],
};

const ARCH_TOKENS: Record<HostArch, string[]> = {
  amd64: ['amd64', 'x86_64', 'x64'],
  arm64: ['arm64', 'aarch64'],
};

const ARCHIVE_SCORE: Record<ArchiveKind, number> = { 'tar.gz': 3, zip: 2, raw: 1 };

export const PERFECT_ASSET_SCORE = ARCHIVE_SCORE['tar.gz'];

const IGNORED_SUFFIXES = ['.sha256', '.sha512', '.sig', '.asc', '.pem', '.txt', '.json', '.sbom', '.deb', '.rpm', '.apk'];

export function detectPlatform(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch,
): HostPlatform {
  const os: HostOs = platform === 'darwin' ? 'darwin' : platform === 'win32' ? 'windows' : 'linux';
  const hostArch: HostArch = arch === 'arm64' ? 'arm64' : 'amd64';
  return { os, arch: hostArch };
}

export function executableName(binaryName: string, platform: HostPlatform): string {
  return platform.os === 'windows' ? `${binaryName}.exe` : binaryName;
}

export function archiveKind(fileName: string): ArchiveKind {
  const lower = fileName.toLowerCase();
  if (lower.endsWith('.tar.gz') || lower.endsWith('.tgz')) return 'tar.gz';
  if (lower.endsWith('.zip')) return 'zip';
  return 'raw';
}

function tokens(name: string): string[] {
  return name.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
}

function hasToken(nameTokens: string[], lowerName: string, candidates: string[]): boolean {
  // x86_64 spans a separator, so it is matched against the whole name
  return candidates.some((c) => (c.includes('_') ? lowerName.includes(c) : nameTokens.includes(c)));
}

/**
 * 0 when the asset is not a build for `platform`, otherwise higher is better:
 * tar.gz over zip over a bare executable.
 */
export function scoreAsset(name: string, platform: HostPlatform): number {
  const lower = name.toLowerCase();
  if (IGNORED_SUFFIXES.some((suffix) => lower.endsWith(suffix))) return 0;

  const nameTokens = tokens(name);
  if (!hasToken(nameTokens, lower, OS_TOKENS[platform.os])) return 0;
  if (!hasToken(nameTokens, lower, ARCH_TOKENS[platform.arch])) return 0;

  return ARCHIVE_SCORE[archiveKind(name)];
}

export function selectAsset(assets: ReleaseAsset[], platform: HostPlatform): ReleaseAsset | undefined {
  let best: ReleaseAsset | undefined;
  let bestScore = 0;
  for (const asset of assets) {
    const score = scoreAsset(asset.name, platform);
    if (score > bestScore) {
      best = asset;
      bestScore = score;
      if (score === PERFECT_ASSET_SCORE) break;
    }
  }
  return best;
}

/**
 * File names release pipelines commonly use, tried in order when the
 * release metadata cannot be read or lists nothing usable.
 */
export function conventionalAssetNames(binaryName: string, version: string, platform: HostPlatform): string[] {
  const names: string[] = [];
  for (const sep of ['_', '-']) {
    const stems = [
      [binaryName, version, platform.os, platform.arch].join(sep),
      [binaryName, platform.os, platform.arch].join(sep),
    ];
    for (const stem of stems) {
      names.push(`${stem}.tar.gz`, `${stem}.zip`, stem);
    }
  }
  return names;
}
