import type { ErrorKind, RunStatus } from './schemas.js';

/**
 * Raised when an engine operation is called from a status that does not allow it.
 * Never coerced into a valid transition.
 */
export class InvalidStateError extends Error {
  readonly operation: string;
  readonly status: RunStatus;

  constructor(operation: string, status: RunStatus, detail?: string) {
    super(
      detail
        ? `Cannot ${operation} while run is ${status}: ${detail}`
        : `Cannot ${operation} while run is ${status}`
    );
    this.name = 'InvalidStateError';
    this.operation = operation;
    this.status = status;
  }
}

export class ConcurrentTransitionError extends Error {
  readonly runId: string;

  constructor(runId: string, detail?: string) {
    super(
      detail
        ? `Run ${runId} already has a transition in progress (${detail})`
        : `Run ${runId} already has a transition in progress`
    );
    this.name = 'ConcurrentTransitionError';
    this.runId = runId;
  }
}

/** The state snapshot could not be written; the transition did not happen. */
export class PersistenceError extends Error {
  readonly cause: unknown;

  constructor(message: string, cause: unknown) {
    super(`${message}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'PersistenceError';
    this.cause = cause;
  }
}

export class ConfigError extends Error {
  readonly configPath: string;
  readonly issues: string[];

  constructor(configPath: string, issues: string[]) {
    super(`Invalid config ${configPath}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.configPath = configPath;
    this.issues = issues;
  }
}

export class TimeoutExceededError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, message = `Operation timed out after ${timeoutMs}ms`) {
    super(message);
    this.name = 'TimeoutExceededError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A single failed worker attempt. Thrown inside the retry loop only;
 * the executor turns the last one into a failed WorkerOutcome.
 */
export class WorkerCallError extends Error {
  readonly kind: ErrorKind;
  readonly exitCode: number | null;
  readonly output: string;
  readonly artifacts: string[];

  constructor(
    message: string,
    options: {
      kind: ErrorKind;
      exitCode?: number | null;
      output?: string;
      artifacts?: string[];
    }
  ) {
    super(message);
    this.name = 'WorkerCallError';
    this.kind = options.kind;
    this.exitCode = options.exitCode ?? null;
    this.output = options.output ?? '';
    this.artifacts = options.artifacts ?? [];
  }
}
