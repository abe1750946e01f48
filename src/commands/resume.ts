import { exitCodeForStatus, openEngine, printJson, resolveRun, RunCommandOptions } from './shared.js';

/**
 * Put a run that needs revision (or was aborted) back into `running`.
 * The phase cursor is untouched; the next advance retries the same phase.
 */
export async function resumeCommand(options: RunCommandOptions): Promise<number> {
  const runId = resolveRun(options);
  const { engine } = openEngine({ ...options, runId });
  const state = await engine.resume();
  printJson(state);
  return exitCodeForStatus(state.status);
}
