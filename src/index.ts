export { RunEngine, describeShortfall } from './supervisor/engine.js';
export type { RunEngineOptions } from './supervisor/engine.js';
export { runBounded } from './supervisor/pool.js';
export { renderRollbackAdvisory, rollbackFileName } from './supervisor/rollback-advisory.js';
export type { RollbackAdvisory } from './supervisor/rollback-advisory.js';
export {
  assertCanPerform,
  canPerform,
  firstEnabledPhase,
  jumpToPhase,
  nextEnabledPhase,
  rollbackToPhase
} from './supervisor/state-machine.js';
export type { EngineOperation } from './supervisor/state-machine.js';

export { RunStore } from './store/run-store.js';
export type { StateStore } from './store/run-store.js';
export { getStatePaths, DEFAULT_STATE_DIR } from './store/runs-root.js';
export type { StatePaths } from './store/runs-root.js';
export { makeRunId, allocateRunId, assertRunId, resolveRunId, findLatestRunId, listRecentRunIds } from './store/run-utils.js';

export { DispatchingExecutor } from './workers/executor.js';
export type { ExecutorOptions } from './workers/executor.js';
export type { WorkerContext, WorkerExecutor, AttemptResult } from './workers/types.js';
export { parseArtifactDeclarations } from './workers/artifacts.js';

export { withTimeout } from './reliability/timeout.js';
export { retry, computeDelay } from './reliability/retry.js';
export type { BackoffPolicy, RetryOptions, RetryAttemptInfo } from './reliability/retry.js';
export { createSeededRandom } from './reliability/random.js';
export type { RandomSource } from './reliability/random.js';
export { isRetryableError, isTransientKind } from './reliability/classify.js';

export { validateArtifacts, renderValidationReport } from './checkpoint/validator.js';
export { buildApprovalPackage, writeApprovalPackage, renderDecision } from './consensus/package.js';
export type { ApprovalPackage, ApprovalPackageOptions, DecisionRecord } from './consensus/package.js';
export { MetricsTracker, renderExposition, computeHygieneScore } from './metrics/tracker.js';

export { loadConfig, parseConfig, resolveConfigPath } from './config/load.js';
export { workflowConfigSchema, MAX_TIMER_MS } from './config/schema.js';
export type { WorkflowConfig, PhaseSpec, RetryPolicy, WorkerSpec } from './config/schema.js';

export * from './types/errors.js';
export type {
  RunState,
  RunStatus,
  RunMetrics,
  PhaseOutcome,
  WorkerOutcome,
  ValidationResult,
  ValidationStatus,
  ErrorKind
} from './types/schemas.js';
