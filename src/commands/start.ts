import { loadConfig, resolveConfigPath } from '../config/load.js';
import { Logger } from '../output/logger.js';
import { allocateRunId, assertRunId } from '../store/run-utils.js';
import { getStatePaths } from '../store/runs-root.js';
import { exitCodeForStatus, openEngine, printJson } from './shared.js';

export interface StartOptions {
  repo: string;
  stateDir?: string;
  config?: string;
  /** Explicit run id (14 digits); defaults to the current UTC timestamp */
  runId?: string;
  /** `key=value` pairs stored in the run's metadata */
  meta?: string[];
  logger?: Logger;
}

export function parseMeta(pairs: string[]): Record<string, string> {
  const meta: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new Error(`Invalid --meta value "${pair}": expected key=value`);
    }
    meta[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return meta;
}

export async function startCommand(options: StartOptions): Promise<number> {
  if (options.runId !== undefined) {
    assertRunId(options.runId);
  }
  const configPath = resolveConfigPath(options.repo, options.config);
  const config = loadConfig(configPath);
  const runId = options.runId ?? allocateRunId(getStatePaths(options.repo, options.stateDir).runs_dir);

  const { engine } = openEngine({
    runId,
    repo: options.repo,
    stateDir: options.stateDir,
    config,
    logger: options.logger
  });

  const state = await engine.start({
    ...parseMeta(options.meta ?? []),
    config_path: configPath
  });

  printJson({
    run_id: state.run_id,
    status: state.status,
    current_phase: state.current_phase
  });
  return exitCodeForStatus(state.status);
}
