#!/usr/bin/env node
import { Command } from 'commander';
import { abortCommand } from './commands/abort.js';
import { advanceCommand } from './commands/advance.js';
import { approveCommand } from './commands/approve.js';
import { logCommand, parseLimit } from './commands/log.js';
import { metricsCommand, parseMetricsFormat } from './commands/metrics.js';
import { rejectCommand } from './commands/reject.js';
import { resumeCommand } from './commands/resume.js';
import { jumpCommand, rollbackCommand } from './commands/rollback.js';
import { reportError } from './commands/shared.js';
import { startCommand } from './commands/start.js';
import { statusAllCommand, statusCommand } from './commands/status.js';

const program = new Command();

program
  .name('phaserun')
  .description('Phase-oriented workflow engine with artifact checkpoints and approval gates');

/** Run a command and turn its result (or error) into the process exit code. */
async function run(command: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await command();
  } catch (error) {
    process.exitCode = reportError(error);
  }
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

program
  .command('start')
  .description('Create a run from the project config and enter its first phase')
  .option('--repo <path>', 'Project root (default: current directory)', '.')
  .option('--state-dir <path>', 'State directory (default: .phaserun)')
  .option('--config <path>', 'Path to phaserun.config.yaml')
  .option('--run-id <id>', 'Explicit run id, 14 digits (default: UTC timestamp)')
  .option('--meta <key=value>', 'Metadata stored with the run (repeatable)', collect, [])
  .action(async (options) => {
    await run(() =>
      startCommand({
        repo: options.repo,
        stateDir: options.stateDir,
        config: options.config,
        runId: options.runId,
        meta: options.meta
      })
    );
  });

program
  .command('advance')
  .description('Run the current phase once')
  .argument('<runId>', "Run ID (or 'latest')")
  .option('--repo <path>', 'Project root (default: current directory)', '.')
  .option('--state-dir <path>', 'State directory (default: .phaserun)')
  .option('--until-blocked', 'Keep advancing until the run stops running', false)
  .action(async (runId: string, options) => {
    await run(() =>
      advanceCommand({
        runId,
        repo: options.repo,
        stateDir: options.stateDir,
        untilBlocked: options.untilBlocked
      })
    );
  });

program
  .command('approve')
  .description('Approve the phase awaiting a decision and move on')
  .argument('<runId>', "Run ID (or 'latest')")
  .option('--repo <path>', 'Project root (default: current directory)', '.')
  .option('--state-dir <path>', 'State directory (default: .phaserun)')
  .action(async (runId: string, options) => {
    await run(() => approveCommand({ runId, repo: options.repo, stateDir: options.stateDir }));
  });

program
  .command('reject')
  .description('Reject the phase awaiting a decision; it will be retried')
  .argument('<runId>', "Run ID (or 'latest')")
  .requiredOption('--reason <text>', 'Why the phase was rejected')
  .option('--repo <path>', 'Project root (default: current directory)', '.')
  .option('--state-dir <path>', 'State directory (default: .phaserun)')
  .action(async (runId: string, options) => {
    await run(() =>
      rejectCommand({ runId, repo: options.repo, stateDir: options.stateDir, reason: options.reason })
    );
  });

program
  .command('resume')
  .description('Return a run that needs revision (or was aborted) to running')
  .argument('<runId>', "Run ID (or 'latest')")
  .option('--repo <path>', 'Project root (default: current directory)', '.')
  .option('--state-dir <path>', 'State directory (default: .phaserun)')
  .action(async (runId: string, options) => {
    await run(() => resumeCommand({ runId, repo: options.repo, stateDir: options.stateDir }));
  });

program
  .command('abort')
  .description('Stop a run; it can be resumed later')
  .argument('<runId>', "Run ID (or 'latest')")
  .option('--reason <text>', 'Recorded in the run errors')
  .option('--repo <path>', 'Project root (default: current directory)', '.')
  .option('--state-dir <path>', 'State directory (default: .phaserun)')
  .action(async (runId: string, options) => {
    await run(() =>
      abortCommand({ runId, repo: options.repo, stateDir: options.stateDir, reason: options.reason })
    );
  });

program
  .command('rollback')
  .description('Rewind a run to its current or an earlier completed phase (files are left in place)')
  .argument('<runId>', "Run ID (or 'latest')")
  .requiredOption('--phase <name>', 'Phase to run again')
  .option('--repo <path>', 'Project root (default: current directory)', '.')
  .option('--state-dir <path>', 'State directory (default: .phaserun)')
  .action(async (runId: string, options) => {
    await run(() =>
      rollbackCommand({ runId, repo: options.repo, stateDir: options.stateDir, phase: options.phase })
    );
  });

program
  .command('jump')
  .description('Admin: move the run to any enabled phase')
  .argument('<runId>', "Run ID (or 'latest')")
  .requiredOption('--phase <name>', 'Phase to continue from')
  .option('--repo <path>', 'Project root (default: current directory)', '.')
  .option('--state-dir <path>', 'State directory (default: .phaserun)')
  .action(async (runId: string, options) => {
    await run(() => jumpCommand({ runId, repo: options.repo, stateDir: options.stateDir, phase: options.phase }));
  });

program
  .command('log')
  .description('Show the tail of the run timeline')
  .argument('<runId>', "Run ID (or 'latest')")
  .option('--repo <path>', 'Project root (default: current directory)', '.')
  .option('--state-dir <path>', 'State directory (default: .phaserun)')
  .option('--type <type>', 'Only events of this type')
  .option('-n, --limit <count>', 'Number of events to show', parseLimit, 50)
  .option('--json', 'Print events as JSON', false)
  .action(async (runId: string, options) => {
    await run(() =>
      logCommand({
        runId,
        repo: options.repo,
        stateDir: options.stateDir,
        type: options.type,
        limit: options.limit,
        json: options.json
      })
    );
  });

program
  .command('status')
  .description('Show run state')
  .argument('[runId]', 'Run ID (omit with --all to list every run)')
  .option('--repo <path>', 'Project root (default: current directory)', '.')
  .option('--state-dir <path>', 'State directory (default: .phaserun)')
  .option('--all', 'List all runs', false)
  .action(async (runId: string | undefined, options) => {
    if (options.all) {
      await run(() => statusAllCommand({ repo: options.repo, stateDir: options.stateDir }));
    } else if (runId) {
      await run(() => statusCommand({ runId, repo: options.repo, stateDir: options.stateDir }));
    } else {
      console.error('Error: Run ID required unless using --all');
      process.exitCode = 1;
    }
  });

program
  .command('metrics')
  .description('Print run metrics')
  .argument('<runId>', "Run ID (or 'latest')")
  .option('--repo <path>', 'Project root (default: current directory)', '.')
  .option('--state-dir <path>', 'State directory (default: .phaserun)')
  .option('--format <format>', 'json or prom', 'json')
  .action(async (runId: string, options) => {
    await run(() =>
      metricsCommand({
        runId,
        repo: options.repo,
        stateDir: options.stateDir,
        format: parseMetricsFormat(options.format)
      })
    );
  });

program.parseAsync().catch((error: unknown) => {
  process.exitCode = reportError(error);
});
