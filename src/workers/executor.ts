import { RetryPolicy, WorkerSpec } from '../config/schema.js';
import { ErrorKind, WorkerOutcome } from '../types/schemas.js';
import { TimeoutExceededError, WorkerCallError } from '../types/errors.js';
import { Logger } from '../output/logger.js';
import { isRetryableError } from '../reliability/classify.js';
import { RandomSource } from '../reliability/random.js';
import { retry, RetryAttemptInfo } from '../reliability/retry.js';
import { withTimeout } from '../reliability/timeout.js';
import { truncateNotes } from './artifacts.js';
import { runLocalAttempt } from './local.js';
import { runRemoteAttempt } from './remote.js';
import { AttemptResult, WorkerContext, WorkerExecutor } from './types.js';

export interface ExecutorOptions {
  retry: RetryPolicy;
  /** Per-attempt timeout when the worker does not set its own */
  timeoutMs: number;
  random?: RandomSource;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  onRetry?: (worker: string, phase: string, info: RetryAttemptInfo) => void;
}

function describeError(error: unknown): { message: string; kind: ErrorKind; exitCode: number | null; output: string; artifacts: string[] } {
  if (error instanceof WorkerCallError) {
    return {
      message: error.message,
      kind: error.kind,
      exitCode: error.exitCode,
      output: error.output,
      artifacts: error.artifacts
    };
  }
  if (error instanceof TimeoutExceededError) {
    return { message: error.message, kind: 'timeout', exitCode: null, output: '', artifacts: [] };
  }
  return {
    message: error instanceof Error ? error.message : String(error),
    kind: 'worker_failed',
    exitCode: null,
    output: '',
    artifacts: []
  };
}

/**
 * Executor over the two worker strategies.
 *
 * The strategy comes from the worker's `kind`, fixed when config was loaded.
 * Each attempt runs under a timeout; failed attempts go through the retry
 * policy, and whatever happens the caller gets a WorkerOutcome.
 */
export class DispatchingExecutor implements WorkerExecutor {
  private readonly options: ExecutorOptions;

  constructor(options: ExecutorOptions) {
    this.options = options;
  }

  async run(worker: WorkerSpec, phase: string, context: WorkerContext): Promise<WorkerOutcome> {
    const started = Date.now();
    const policy = this.options.retry;
    const timeoutMs = worker.timeout_ms ?? this.options.timeoutMs;
    const logger = this.options.logger ?? console;
    let attempts = 0;

    try {
      const result = await retry(
        (attempt) => {
          attempts = attempt;
          return withTimeout(
            (signal) => this.attempt(worker, phase, context, signal),
            timeoutMs,
            `Worker ${worker.id} timed out after ${timeoutMs}ms`
          );
        },
        policy,
        (error) => isRetryableError(error, policy),
        {
          random: this.options.random,
          sleep: this.options.sleep,
          onRetry: (info) => {
            const reason = info.error instanceof Error ? info.error.message : String(info.error);
            logger.warn(
              `[retry] ${phase}/${worker.id} attempt ${info.attempt}/${policy.max_retries + 1} failed, ` +
              `retrying in ${Math.round(info.delayMs)}ms: ${reason.slice(0, 100)}`
            );
            this.options.onRetry?.(worker.id, phase, info);
          }
        }
      );

      return {
        worker: worker.id,
        success: true,
        artifacts: result.artifacts,
        notes: truncateNotes(result.output),
        errors: [],
        exit_code: result.exit_code,
        duration_ms: Date.now() - started,
        retry_count: attempts - 1,
        error_kind: null
      };
    } catch (error) {
      const described = describeError(error);
      return {
        worker: worker.id,
        success: false,
        artifacts: described.artifacts,
        notes: truncateNotes(described.output),
        errors: [described.message],
        exit_code: described.exitCode,
        duration_ms: Date.now() - started,
        retry_count: Math.max(0, attempts - 1),
        error_kind: described.kind
      };
    }
  }

  private attempt(
    worker: WorkerSpec,
    phase: string,
    context: WorkerContext,
    signal: AbortSignal
  ): Promise<AttemptResult> {
    switch (worker.kind) {
      case 'local':
        return runLocalAttempt(worker, phase, context, signal, this.options.retry);
      case 'remote':
        return runRemoteAttempt(worker, phase, context, signal);
      default: {
        const unreachable: never = worker;
        throw new Error(`Unsupported worker kind: ${JSON.stringify(unreachable)}`);
      }
    }
  }
}
