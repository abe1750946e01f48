import { WorkflowConfig } from '../config/schema.js';
import { Logger, stderrLogger } from '../output/logger.js';
import { RunStore } from '../store/run-store.js';
import { resolveRunId } from '../store/run-utils.js';
import { getStatePaths, StatePaths, stateDirSkipName } from '../store/runs-root.js';
import { RunEngine } from '../supervisor/engine.js';
import { RunStatus } from '../types/schemas.js';
import { DispatchingExecutor } from '../workers/executor.js';

/** Options every run-scoped command takes */
export interface RunCommandOptions {
  runId: string;
  repo: string;
  stateDir?: string;
  logger?: Logger;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_ATTENTION = 2;

/**
 * 0 while the run can make progress on its own (or is done), 2 when it is
 * waiting on someone: a decision, a revision, or a resume after abort.
 */
export function exitCodeForStatus(status: RunStatus): number {
  switch (status) {
    case 'awaiting_approval':
    case 'needs_revision':
    case 'aborted':
      return EXIT_ATTENTION;
    default:
      return EXIT_OK;
  }
}

export interface EngineHandle {
  engine: RunEngine;
  store: RunStore;
  paths: StatePaths;
  config: WorkflowConfig;
}

/**
 * Wire an engine for one run. Without an explicit config the run's own
 * snapshot is used, so later commands never see config edits made mid-run.
 */
export function openEngine(options: {
  runId: string;
  repo: string;
  stateDir?: string;
  config?: WorkflowConfig;
  logger?: Logger;
}): EngineHandle {
  const paths = getStatePaths(options.repo, options.stateDir);
  const logger = options.logger ?? stderrLogger;
  const store = RunStore.init(options.runId, paths.runs_dir);
  const config = options.config ?? store.readConfigSnapshot();

  const executor = new DispatchingExecutor({
    retry: config.retry,
    timeoutMs: config.timeouts.worker_ms,
    logger,
    onRetry: (worker, phase, info) => {
      try {
        store.appendEvent({
          type: 'worker_retry',
          source: 'executor',
          payload: {
            phase,
            worker,
            attempt: info.attempt,
            delay_ms: Math.round(info.delayMs),
            error: info.error instanceof Error ? info.error.message : String(info.error)
          }
        });
      } catch (error) {
        logger.warn(
          `[retry] ${options.runId} could not append worker_retry event: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
  });

  const skip = stateDirSkipName(paths);
  const engine = new RunEngine({
    config,
    store,
    executor,
    rootDir: paths.project_root,
    skipDirs: skip ? [skip] : [],
    logger
  });

  return { engine, store, paths, config };
}

/** Resolve 'latest' and check the run exists before anything is opened. */
export function resolveRun(options: RunCommandOptions): string {
  return resolveRunId(options.runId, getStatePaths(options.repo, options.stateDir).runs_dir);
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Print an error as `{ error, message }` on stderr; returns the exit code.
 */
export function reportError(error: unknown): number {
  const name = error instanceof Error ? error.name : 'Error';
  const message = error instanceof Error ? error.message : String(error);
  console.error(JSON.stringify({ error: name, message }, null, 2));
  return EXIT_FAILURE;
}
