import { exitCodeForStatus, openEngine, printJson, resolveRun, RunCommandOptions } from './shared.js';

export interface RejectOptions extends RunCommandOptions {
  reason: string;
}

export async function rejectCommand(options: RejectOptions): Promise<number> {
  if (!options.reason.trim()) {
    throw new Error('A rejection needs a --reason');
  }
  const runId = resolveRun(options);
  const { engine } = openEngine({ ...options, runId });
  const state = await engine.reject(options.reason.trim());
  printJson(state);
  return exitCodeForStatus(state.status);
}
