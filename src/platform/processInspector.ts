import { existsSync, readFileSync, readdirSync } from 'node:fs';
import { runCommand, type CommandRunner } from './commandRunner.js';
import { errorCode } from '../errors.js';
import type { ProcessEntry } from '../types/index.js';

export interface ProcessInspector {
  isAlive(pid: number): boolean;
  list(): Promise<ProcessEntry[]>;
  /** Returns false when the process no longer exists. */
  signal(pid: number, signal: NodeJS.Signals): boolean;
}

// A zombie still answers kill(pid, 0) but has already exited.
function isZombie(pid: number): boolean {
  try {
    const stat = readFileSync(`/proc/${pid}/stat`, 'utf-8');
    const state = stat.slice(stat.lastIndexOf(')') + 2, stat.lastIndexOf(')') + 3);
    return state === 'Z' || state === 'X';
  } catch {
    return false;
  }
}

function listFromProc(): ProcessEntry[] {
  const entries: ProcessEntry[] = [];
  for (const name of readdirSync('/proc')) {
    if (!/^\d+$/.test(name)) continue;
    try {
      const command = readFileSync(`/proc/${name}/cmdline`, 'utf-8').split('\0').filter(Boolean).join(' ');
      if (command) {
        entries.push({ pid: Number(name), command });
      }
    } catch {
      // exited between readdir and read
    }
  }
  return entries;
}

export function parsePsOutput(output: string): ProcessEntry[] {
  return output.split('\n').flatMap((line) => {
    const match = /^\s*(\d+)\s+(.+)$/.exec(line);
    return match ? [{ pid: Number(match[1]), command: match[2].trim() }] : [];
  });
}

export function createProcessInspector(run: CommandRunner = runCommand): ProcessInspector {
  return {
    isAlive(pid) {
      if (!Number.isInteger(pid) || pid <= 0) {
        return false;
      }
      try {
        process.kill(pid, 0);
      } catch (error) {
        // EPERM: the process exists but belongs to someone else
        return errorCode(error) === 'EPERM';
      }
      return !isZombie(pid);
    },

    async list() {
      if (existsSync('/proc/self/cmdline')) {
        return listFromProc();
      }
      const result = await run('ps', ['-axww', '-o', 'pid=,command='], { timeoutMs: 10_000 });
      if (result.code !== 0) {
        throw new Error(`ps failed: ${result.stderr.trim() || `exit code ${result.code}`}`);
      }
      return parsePsOutput(result.stdout);
    },

    signal(pid, signal) {
      try {
        process.kill(pid, signal);
        return true;
      } catch (error) {
        if (errorCode(error) === 'ESRCH') {
          return false;
        }
        throw error;
      }
    },
  };
}
