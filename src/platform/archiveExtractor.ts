import { mkdirSync } from 'node:fs';
import { runCommand, type CommandRunner } from './commandRunner.js';
import type { ArchiveKind } from '../services/releaseAssets.js';

export interface ArchiveExtractor {
  extract(archivePath: string, destDir: string, kind: Exclude<ArchiveKind, 'raw'>): Promise<void>;
}

/**
 * Extraction through the system `tar` and `unzip` tools.
 */
export function createArchiveExtractor(run: CommandRunner = runCommand): ArchiveExtractor {
  return {
    async extract(archivePath, destDir, kind) {
      mkdirSync(destDir, { recursive: true });
      const [command, args]: [string, string[]] =
        kind === 'tar.gz'
          ? ['tar', ['-xzf', archivePath, '-C', destDir]]
          : ['unzip', ['-o', '-q', archivePath, '-d', destDir]];

      const result = await run(command, args, { timeoutMs: 120_000 });
      if (result.code !== 0) {
        const detail = result.stderr.trim() || `exit code ${result.code}`;
        throw new Error(`${command} could not extract ${archivePath}: ${detail}`);
      }
    },
  };
}
