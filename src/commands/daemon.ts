import type { Command } from 'commander';
import pc from 'picocolors';
import {
  environmentStatus,
  environmentTarget,
  restartEnvironment,
  startEnvironment,
  stopEnvironment,
} from '../services/environmentService.js';
import type { StartResult } from '../services/daemonSupervisor.js';
import { formatHealth, formatProcessState, keyValue, success, warning } from '../utils/output.js';
import { parseLineCount, resolveRoot, type ContextFactory, type PathOption } from './common.js';

interface StartFlags extends PathOption {
  force?: boolean;
  binary?: string;
}

function reportStart(result: StartResult): void {
  if (result.status === 'already-running') {
    console.log(warning(`Daemon already running (PID ${result.pid}); use --force to restart it`));
    return;
  }
  if (result.orphansReaped.length > 0) {
    console.log(warning(`Terminated untracked daemon(s): ${result.orphansReaped.join(', ')}`));
  }
  console.log(success(`Daemon started (PID ${result.pid})`));
  if (result.health) {
    console.log(keyValue([['health', formatHealth(result.health)]]));
  }
}

export function registerDaemonCommands(program: Command, getContext: ContextFactory): void {
  program
    .command('start')
    .description('Start the environment\'s daemon in the background')
    .option('-p, --path <dir>', 'Environment root')
    .option('-f, --force', 'Restart the daemon if it is already running')
    .option('-b, --binary <spec>', 'Use this binary (path or version) for this run')
    .action(async (flags: StartFlags) => {
      const ctx = getContext();
      const result = await startEnvironment(ctx, resolveRoot(flags), { force: flags.force, binary: flags.binary });
      reportStart(result);
    });

  program
    .command('stop')
    .description('Stop the environment\'s daemon')
    .option('-p, --path <dir>', 'Environment root')
    .action(async (flags: PathOption) => {
      const result = await stopEnvironment(getContext(), resolveRoot(flags));
      if (result.status === 'not-running') {
        console.log(pc.gray('Daemon is not running'));
        return;
      }
      console.log(success(`Daemon ${result.pid} stopped${result.forced ? ' (killed)' : ''}`));
    });

  program
    .command('restart')
    .description('Stop, then start the environment\'s daemon')
    .option('-p, --path <dir>', 'Environment root')
    .option('-b, --binary <spec>', 'Use this binary (path or version) for this run')
    .action(async (flags: StartFlags) => {
      const result = await restartEnvironment(getContext(), resolveRoot(flags), { binary: flags.binary });
      reportStart(result);
    });

  program
    .command('status')
    .description('Show whether the daemon is running and answering')
    .option('-p, --path <dir>', 'Environment root')
    .action(async (flags: PathOption) => {
      const report = await environmentStatus(getContext(), resolveRoot(flags));
      console.log(keyValue([
        ['process', formatProcessState(report.process)],
        ['health', formatHealth(report.health)],
        ['endpoint', report.health.url || pc.gray('-')],
      ]));
    });

  program
    .command('logs')
    .description('Print the end of the daemon log')
    .option('-p, --path <dir>', 'Environment root')
    .option('-n, --lines <count>', 'Number of lines', parseLineCount, 50)
    .action((flags: PathOption & { lines: number }) => {
      const ctx = getContext();
      const target = environmentTarget(ctx, resolveRoot(flags));
      // reports and clears a stale PID file before showing output
      ctx.supervisor.checkPid(target);
      const lines = ctx.supervisor.readLogs(target, flags.lines);
      if (lines.length === 0) {
        console.log(pc.gray(`No output yet in ${target.paths.logPath}`));
        return;
      }
      console.log(lines.join('\n'));
    });
}
