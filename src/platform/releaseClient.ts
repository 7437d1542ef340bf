import { writeFileSync } from 'node:fs';
import type { ReleaseAsset } from '../services/releaseAssets.js';
import type { DaemonSettings } from '../types/index.js';

export interface ReleaseClient {
  /** Assets of the release tagged with `version`; an empty list when no such release exists. */
  getReleaseAssets(version: string): Promise<ReleaseAsset[]>;
  download(url: string, destPath: string): Promise<void>;
  conventionalAssetUrl(version: string, fileName: string): string;
}

const METADATA_TIMEOUT_MS = 15_000;
const DOWNLOAD_TIMEOUT_MS = 300_000;

function isReleasePayload(value: unknown): value is { assets: Array<{ name: unknown; browser_download_url: unknown }> } {
  return typeof value === 'object' && value !== null && 'assets' in value && Array.isArray(value.assets);
}

/**
 * GitHub-style release API: metadata by exact tag, assets by download URL.
 */
export function createReleaseClient(settings: DaemonSettings, token = process.env.GITHUB_TOKEN): ReleaseClient {
  const headers: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    'User-Agent': 'boxenv',
  };
  if (token) {
    headers.Authorization = `Bearer ${token}`;
  }

  return {
    async getReleaseAssets(version) {
      for (const tag of [`v${version}`, version]) {
        const url = `${settings.apiBaseUrl}/repos/${settings.releaseRepo}/releases/tags/${tag}`;
        const response = await fetch(url, { headers, signal: AbortSignal.timeout(METADATA_TIMEOUT_MS) });
        if (response.status === 404) {
          continue;
        }
        if (!response.ok) {
          throw new Error(`Release lookup for ${tag} failed: ${response.status} ${response.statusText}`);
        }

        const data: unknown = await response.json();
        if (!isReleasePayload(data)) {
          throw new Error(`Release lookup for ${tag} returned an unexpected payload`);
        }
        return data.assets.flatMap((asset) =>
          typeof asset.name === 'string' && typeof asset.browser_download_url === 'string'
            ? [{ name: asset.name, url: asset.browser_download_url }]
            : [],
        );
      }
      return [];
    },

    async download(url, destPath) {
      const response = await fetch(url, {
        headers: { 'User-Agent': 'boxenv' },
        redirect: 'follow',
        signal: AbortSignal.timeout(DOWNLOAD_TIMEOUT_MS),
      });
      if (!response.ok) {
        throw new Error(`Download of ${url} failed: ${response.status} ${response.statusText}`);
      }
      writeFileSync(destPath, Buffer.from(await response.arrayBuffer()));
    },

    conventionalAssetUrl(version, fileName) {
      return `${settings.downloadBaseUrl}/${settings.releaseRepo}/releases/download/v${version}/${fileName}`;
    },
  };
}
