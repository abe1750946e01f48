import { exitCodeForStatus, openEngine, printJson, resolveRun, RunCommandOptions } from './shared.js';

export interface PhaseTargetOptions extends RunCommandOptions {
  phase: string;
}

/**
 * Rewind a run to an earlier phase. Files are left in place; the advisory
 * written to the run directory lists what to check by hand.
 */
export async function rollbackCommand(options: PhaseTargetOptions): Promise<number> {
  const runId = resolveRun(options);
  const { engine } = openEngine({ ...options, runId });
  const state = await engine.rollback(options.phase);
  printJson(state);
  return exitCodeForStatus(state.status);
}

export async function jumpCommand(options: PhaseTargetOptions): Promise<number> {
  const runId = resolveRun(options);
  const { engine } = openEngine({ ...options, runId });
  const state = await engine.jump(options.phase);
  printJson(state);
  return exitCodeForStatus(state.status);
}
