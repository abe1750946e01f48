import fs from 'node:fs';
import path from 'node:path';
import { RunStore } from '../store/run-store.js';
import { listRecentRunIds } from '../store/run-utils.js';
import { getStatePaths } from '../store/runs-root.js';
import { createIdleState } from '../supervisor/state-machine.js';
import { exitCodeForStatus, EXIT_OK, printJson, resolveRun, RunCommandOptions } from './shared.js';

export interface StatusAllOptions {
  repo: string;
  stateDir?: string;
  limit?: number;
}

interface RunSummary {
  run_id: string;
  status: string;
  current_phase: string | null;
  completed_phases: number;
  updated_at: string | null;
  error?: string;
}

/**
 * Print the persisted state of one run. Read-only: no lock, no writes.
 */
export async function statusCommand(options: RunCommandOptions): Promise<number> {
  const runId = resolveRun(options);
  const store = RunStore.open(runId, getStatePaths(options.repo, options.stateDir).runs_dir);
  const state = store.hasState() ? store.readState() : createIdleState(runId);
  printJson(state);
  return exitCodeForStatus(state.status);
}

/**
 * One line per run, most recent first. Unreadable state files are listed
 * with their error instead of failing the whole listing.
 */
export async function statusAllCommand(options: StatusAllOptions): Promise<number> {
  const runsDir = getStatePaths(options.repo, options.stateDir).runs_dir;
  const summaries: RunSummary[] = [];

  for (const runId of listRecentRunIds(runsDir, options.limit ?? 50)) {
    if (!fs.existsSync(path.join(runsDir, runId, 'state.json'))) {
      summaries.push({ run_id: runId, status: 'idle', current_phase: null, completed_phases: 0, updated_at: null });
      continue;
    }
    try {
      const state = RunStore.open(runId, runsDir).readState();
      summaries.push({
        run_id: runId,
        status: state.status,
        current_phase: state.current_phase,
        completed_phases: state.completed_phases.length,
        updated_at: state.updated_at
      });
    } catch (error) {
      summaries.push({
        run_id: runId,
        status: 'unknown',
        current_phase: null,
        completed_phases: 0,
        updated_at: null,
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  printJson(summaries);
  return EXIT_OK;
}
