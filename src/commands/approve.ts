import { exitCodeForStatus, openEngine, printJson, resolveRun, RunCommandOptions } from './shared.js';

export async function approveCommand(options: RunCommandOptions): Promise<number> {
  const runId = resolveRun(options);
  const { engine } = openEngine({ ...options, runId });
  const state = await engine.approve();
  printJson(state);
  return exitCodeForStatus(state.status);
}
