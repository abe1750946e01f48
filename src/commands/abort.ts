import { exitCodeForStatus, openEngine, printJson, resolveRun, RunCommandOptions } from './shared.js';

export interface AbortOptions extends RunCommandOptions {
  reason?: string;
}

export async function abortCommand(options: AbortOptions): Promise<number> {
  const runId = resolveRun(options);
  const { engine } = openEngine({ ...options, runId });
  const state = await engine.abort(options.reason);
  printJson(state);
  return exitCodeForStatus(state.status);
}
