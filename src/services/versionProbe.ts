import { createHash } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { runCommand, type CommandRunner } from '../platform/commandRunner.js';
import type { BinaryBuildInfo } from '../types/index.js';

const VERSION_LINE = /^(\S+)\s+version\s+v?(\S+)(?:\s+\(([^)]*)\))?/;

/**
 * Parses `name version X.Y.Z (commit; toolchain; os/arch; timestamp)`.
 * The parenthesised build details are optional.
 */
export function parseVersionOutput(output: string): BinaryBuildInfo | undefined {
  for (const line of output.split('\n')) {
    const match = VERSION_LINE.exec(line.trim());
    if (!match) continue;

    const info: BinaryBuildInfo = { name: match[1], version: match[2] };
    if (match[3] !== undefined) {
      const [commit, toolchain, target, builtAt] = match[3].split(';').map((part) => part.trim());
      if (commit) info.commit = commit;
      if (toolchain) info.toolchain = toolchain;
      if (target) {
        const [os, arch] = target.split('/');
        if (os) info.os = os;
        if (arch) info.arch = arch;
      }
      if (builtAt) info.builtAt = builtAt;
    }
    return info;
  }
  return undefined;
}

/**
 * Asks the binary what it is. Any failure means "unknown", never an error:
 * the cache directory name already gives a best guess.
 */
export async function probeBinaryVersion(
  path: string,
  run: CommandRunner = runCommand,
): Promise<BinaryBuildInfo | undefined> {
  try {
    const result = await run(path, ['--version'], { timeoutMs: 5000 });
    return parseVersionOutput(`${result.stdout}\n${result.stderr}`);
  } catch {
    return undefined;
  }
}

export function hashFile(path: string): string | undefined {
  try {
    return createHash('sha256').update(readFileSync(path)).digest('hex');
  } catch {
    return undefined;
  }
}
