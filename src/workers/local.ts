import path from 'node:path';
import { execa, ExecaError } from 'execa';
import { LocalWorkerConfig, RetryPolicy } from '../config/schema.js';
import { TimeoutExceededError, WorkerCallError } from '../types/errors.js';
import { classifyExitCode } from '../reliability/classify.js';
import { parseArtifactDeclarations } from './artifacts.js';
import { AttemptResult, WorkerContext } from './types.js';

export type LocalWorkerSpec = LocalWorkerConfig & { id: string };

function asText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Env vars every local worker sees in addition to the inherited environment.
 */
export function buildWorkerEnv(
  worker: LocalWorkerSpec,
  phase: string,
  context: WorkerContext
): Record<string, string> {
  return {
    ...worker.env,
    PHASERUN_RUN_ID: context.run_id,
    PHASERUN_PHASE: phase,
    PHASERUN_WORKER: worker.id,
    PHASERUN_ROOT: context.root_dir,
    PHASERUN_ARTIFACTS: JSON.stringify(context.phase_artifacts)
  };
}

/**
 * Run one attempt of a local worker.
 *
 * Exit 0 resolves with the parsed stdout. Any other ending throws
 * WorkerCallError so the retry layer can classify it.
 */
export async function runLocalAttempt(
  worker: LocalWorkerSpec,
  phase: string,
  context: WorkerContext,
  signal: AbortSignal,
  policy: Pick<RetryPolicy, 'transient_exit_codes'>
): Promise<AttemptResult> {
  const cwd = worker.cwd ? path.resolve(context.root_dir, worker.cwd) : context.root_dir;
  const commandLine = [worker.bin, ...worker.args].join(' ');

  try {
    const result = await execa(worker.bin, worker.args, {
      cwd,
      input: worker.request ?? '',
      env: buildWorkerEnv(worker, phase, context),
      cancelSignal: signal,
      stdout: 'pipe',
      stderr: 'pipe'
    });

    const stdout = asText(result.stdout);
    return {
      exit_code: result.exitCode ?? 0,
      output: stdout,
      artifacts: parseArtifactDeclarations(stdout)
    };
  } catch (error) {
    if (signal.aborted && signal.reason instanceof TimeoutExceededError) {
      throw signal.reason;
    }

    if (error instanceof ExecaError) {
      const stdout = asText(error.stdout);
      const stderr = asText(error.stderr);

      if (error.exitCode === undefined && error.signal) {
        throw new WorkerCallError(`${worker.id} was terminated by ${error.signal}`, {
          kind: 'worker_failed',
          output: stderr || stdout,
          artifacts: parseArtifactDeclarations(stdout)
        });
      }

      if (error.exitCode === undefined) {
        throw new WorkerCallError(`Failed to start ${commandLine}: ${error.shortMessage}`, {
          kind: 'spawn_failed',
          output: stderr || stdout
        });
      }

      throw new WorkerCallError(`${worker.id} exited with code ${error.exitCode}`, {
        kind: classifyExitCode(error.exitCode, policy),
        exitCode: error.exitCode,
        output: stderr || stdout,
        artifacts: parseArtifactDeclarations(stdout)
      });
    }

    throw new WorkerCallError(
      `Failed to start ${commandLine}: ${error instanceof Error ? error.message : String(error)}`,
      { kind: 'spawn_failed' }
    );
  }
}
