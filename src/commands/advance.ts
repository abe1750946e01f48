import { PhaseOutcome } from '../types/schemas.js';
import { exitCodeForStatus, openEngine, printJson, resolveRun, RunCommandOptions } from './shared.js';

export interface AdvanceOptions extends RunCommandOptions {
  /** Keep advancing while the run stays `running` */
  untilBlocked?: boolean;
}

export async function advanceCommand(options: AdvanceOptions): Promise<number> {
  const runId = resolveRun(options);
  const { engine } = openEngine({ ...options, runId });

  const outcomes: PhaseOutcome[] = [];
  let state = engine.status();
  do {
    outcomes.push(await engine.advance());
    state = engine.status();
  } while (options.untilBlocked && state.status === 'running');

  printJson({
    run_id: runId,
    status: state.status,
    current_phase: state.current_phase,
    outcomes
  });
  return exitCodeForStatus(state.status);
}
