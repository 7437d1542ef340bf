#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import pc from 'picocolors';
import { registerCommands } from './commands/index.js';
import { createContext, type BoxenvContext } from './services/context.js';
import { getLogLevel, setLogLevel } from './utils/logger.js';

function packageVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // running from an unusual layout; fall through
  }
  return '0.0.0';
}

function printError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(pc.red(`Error: ${message}`));

  if (getLogLevel() !== 'debug') return;
  let cause = error instanceof Error ? error.cause : undefined;
  while (cause !== undefined) {
    console.error(pc.gray(`  caused by: ${cause instanceof Error ? cause.message : String(cause)}`));
    cause = cause instanceof Error ? cause.cause : undefined;
  }
}

let context: BoxenvContext | undefined;

const program = new Command()
  .name('boxenv')
  .description('Isolated, switchable environments for the sync daemon')
  .version(packageVersion())
  .option('-v, --verbose', 'Show debug output')
  .option('-q, --quiet', 'Only show errors')
  .hook('preAction', () => {
    const opts = program.opts<{ verbose?: boolean; quiet?: boolean }>();
    if (opts.verbose) setLogLevel('debug');
    else if (opts.quiet) setLogLevel('error');
  });

registerCommands(program, () => (context ??= createContext()));

try {
  await program.parseAsync(process.argv);
} catch (error) {
  printError(error);
  process.exitCode = 1;
}
