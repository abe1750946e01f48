import path from 'node:path';
import { PhaseSpec, WorkerSpec, WorkflowConfig, findPhase, resolveWorker } from '../config/schema.js';
import {
  collectPhaseArtifacts,
  renderValidationReport,
  validateArtifacts
} from '../checkpoint/validator.js';
import {
  buildApprovalPackage,
  DecisionRecord,
  decisionFileName,
  renderDecision,
  writeApprovalPackage
} from '../consensus/package.js';
import { MetricsTracker } from '../metrics/tracker.js';
import { Logger } from '../output/logger.js';
import { StateStore } from '../store/run-store.js';
import { ConcurrentTransitionError, InvalidStateError, PersistenceError } from '../types/errors.js';
import { Event, PhaseOutcome, RunMetrics, RunState, ValidationResult, WorkerOutcome } from '../types/schemas.js';
import { WorkerContext, WorkerExecutor } from '../workers/types.js';
import { runBounded } from './pool.js';
import {
  abortRun,
  assertCanPerform,
  beginPhaseAttempt,
  completeCurrentPhase,
  createIdleState,
  createInitialState,
  firstEnabledPhase,
  markAwaitingApproval,
  jumpToPhase,
  markNeedsRevision,
  nextEnabledPhase,
  rejectApproval,
  resumeRun,
  rollbackToPhase
} from './state-machine.js';
import { renderRollbackAdvisory, rollbackFileName } from './rollback-advisory.js';

export interface RunEngineOptions {
  config: WorkflowConfig;
  store: StateStore;
  executor: WorkerExecutor;
  /** Project root; artifact patterns and local worker cwd resolve against it */
  rootDir: string;
  /** Directory names left out of artifact searches */
  skipDirs?: string[];
  logger?: Logger;
  now?: () => Date;
}

/**
 * Drives one run through its phases.
 *
 * Every public method loads the persisted state first and commits a full
 * snapshot before returning, so an engine holds no run state between calls.
 * Calls are non-reentrant: a second mutating call while one is in flight
 * fails with ConcurrentTransitionError, in this process via the busy flag and
 * across processes via the store's lock file.
 */
export class RunEngine {
  private readonly config: WorkflowConfig;
  private readonly store: StateStore;
  private readonly executor: WorkerExecutor;
  private readonly rootDir: string;
  private readonly skipDirs: string[];
  private readonly logger: Logger;
  private readonly now: () => Date;
  private inFlight: string | null = null;

  constructor(options: RunEngineOptions) {
    this.config = options.config;
    this.store = options.store;
    this.executor = options.executor;
    this.rootDir = options.rootDir;
    this.skipDirs = options.skipDirs ?? [];
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
  }

  get runId(): string {
    return this.store.runId;
  }

  async start(metadata: Record<string, unknown> = {}): Promise<RunState> {
    return this.exclusive('start', async () => {
      if (this.store.hasState()) {
        throw new InvalidStateError('start', this.store.readState().status, 'run already exists');
      }

      const state = createInitialState({
        run_id: this.runId,
        first_phase: firstEnabledPhase(this.config.phases),
        metadata
      });

      this.persist('config snapshot', () => this.store.writeConfigSnapshot(this.config));
      this.commit(state);

      this.emit({
        type: 'run_started',
        source: 'engine',
        payload: { current_phase: state.current_phase, status: state.status, metadata }
      });
      this.logger.log(
        state.current_phase
          ? `[engine] ${this.runId} started at phase ${state.current_phase}`
          : `[engine] ${this.runId} has no enabled phases; marked completed`
      );

      this.saveMetrics(new MetricsTracker(this.runId, { now: this.now }), state);
      return state;
    });
  }

  /**
   * Run the current phase once: workers, then validation, then route to
   * needs_revision, awaiting_approval, or the next phase.
   */
  async advance(): Promise<PhaseOutcome> {
    return this.exclusive('advance', async () => {
      const loaded = this.load('advance');
      assertCanPerform(loaded, 'advance');
      const phase = this.currentPhaseSpec(loaded);
      const state = beginPhaseAttempt(loaded);
      const tracker = this.loadMetrics();

      this.logger.log(
        `[engine] ${this.runId} phase ${phase.name} attempt ${state.phase_attempt}: ` +
        `${phase.workers.length} worker(s)${phase.parallel ? `, up to ${phase.max_concurrency} at once` : ''}`
      );
      this.emit({
        type: 'phase_started',
        source: 'engine',
        payload: { phase: phase.name, attempt: state.phase_attempt, workers: phase.workers }
      });

      tracker.startPhase(phase.name);
      const outcomes = await this.runWorkers(phase, state, tracker);

      // Only after every worker has settled
      const validation = validateArtifacts(phase.artifacts, this.rootDir, { skipDirs: this.skipDirs });
      const completedAt = this.now().toISOString();
      this.persist('validation report', () =>
        this.store.writeValidationReport(phase.name, renderValidationReport(phase.name, validation, completedAt))
      );

      const workersOk = outcomes.every((o) => o.success);
      const success = workersOk && validation.status === 'pass';
      const artifacts = collectPhaseArtifacts(validation, outcomes.map((o) => o.artifacts));
      tracker.endPhase(phase.name, validation.status, artifacts.length);

      const awaiting = success && phase.requires_approval;
      const outcome: PhaseOutcome = {
        phase: phase.name,
        success,
        worker_outcomes: outcomes,
        validation,
        requires_approval: phase.requires_approval,
        awaiting_approval: awaiting,
        completed_at: completedAt
      };

      let next: RunState;
      if (!success) {
        next = markNeedsRevision(state, describeShortfall(phase.name, outcomes, validation));
      } else if (awaiting) {
        next = markAwaitingApproval(state, artifacts);
        tracker.setStatus(next.status);
        const pkg = buildApprovalPackage(outcome, tracker.snapshot(), {
          runId: this.runId,
          metricsPaths: this.store.metricsPaths(),
          createdAt: completedAt
        });
        const requestPath = path.join(this.store.consensusDir(phase.name), 'REQUEST.md');
        this.persist('approval package', () => writeApprovalPackage(pkg, requestPath));
      } else {
        next = completeCurrentPhase(state, artifacts, nextEnabledPhase(this.config.phases, phase.name));
      }

      this.commit(next);

      this.emit({
        type: 'phase_finished',
        source: 'engine',
        payload: {
          phase: phase.name,
          success,
          validation_status: validation.status,
          missing: validation.missing,
          status: next.status,
          next_phase: next.current_phase
        }
      });
      this.logPhaseResult(phase.name, validation, next);
      this.saveMetrics(tracker, next);

      return outcome;
    });
  }

  async approve(): Promise<RunState> {
    return this.exclusive('approve', async () => {
      const state = this.load('approve');
      assertCanPerform(state, 'approve');
      const phase = this.currentPhaseSpec(state);

      const validation = validateArtifacts(phase.artifacts, this.rootDir, { skipDirs: this.skipDirs });
      if (validation.status !== 'pass') {
        this.logger.warn(
          `[engine] ${this.runId} approving ${phase.name} although artifacts now validate as ${validation.status}`
        );
      }
      const pending = state.phase_artifacts[phase.name] ?? [];
      const artifacts = collectPhaseArtifacts(validation, [pending]);
      const next = completeCurrentPhase(state, artifacts, nextEnabledPhase(this.config.phases, phase.name));

      this.commit(next);

      const decidedAt = this.now().toISOString();
      this.recordDecision(phase.name, decidedAt, {
        run_id: this.runId,
        phase: phase.name,
        approved: true,
        decided_at: decidedAt,
        validation_status: validation.status
      });
      this.emit({
        type: 'approval_granted',
        source: 'engine',
        payload: { phase: phase.name, artifacts, next_phase: next.current_phase, status: next.status }
      });
      this.logger.log(
        next.current_phase
          ? `[engine] ${this.runId} ${phase.name} approved; next phase ${next.current_phase}`
          : `[engine] ${this.runId} ${phase.name} approved; run completed`
      );
      this.saveMetrics(this.loadMetrics(), next);
      return next;
    });
  }

  async reject(reason: string): Promise<RunState> {
    return this.exclusive('reject', async () => {
      const state = this.load('reject');
      assertCanPerform(state, 'reject');
      const phase = this.currentPhaseSpec(state);
      const next = rejectApproval(state, reason);

      this.commit(next);

      const decidedAt = this.now().toISOString();
      this.recordDecision(phase.name, decidedAt, {
        run_id: this.runId,
        phase: phase.name,
        approved: false,
        reason,
        decided_at: decidedAt
      });
      this.emit({
        type: 'approval_rejected',
        source: 'engine',
        payload: { phase: phase.name, reason }
      });
      this.logger.log(`[engine] ${this.runId} ${phase.name} rejected: ${reason}`);
      this.saveMetrics(this.loadMetrics(), next);
      return next;
    });
  }

  async resume(): Promise<RunState> {
    return this.exclusive('resume', async () => {
      const state = this.load('resume');
      assertCanPerform(state, 'resume');
      const next = resumeRun(state);

      this.commit(next);

      this.emit({
        type: 'run_resumed',
        source: 'engine',
        payload: { from: state.status, phase: next.current_phase, attempt: next.phase_attempt }
      });
      this.logger.log(`[engine] ${this.runId} resumed at phase ${next.current_phase ?? '-'}`);
      this.saveMetrics(this.loadMetrics(), next);
      return next;
    });
  }

  async abort(reason?: string): Promise<RunState> {
    return this.exclusive('abort', async () => {
      const state = this.load('abort');
      assertCanPerform(state, 'abort');
      const next = abortRun(state, reason);

      this.commit(next);

      this.emit({
        type: 'run_aborted',
        source: 'engine',
        payload: { from: state.status, phase: next.current_phase, reason: reason ?? null }
      });
      this.logger.log(`[engine] ${this.runId} aborted${reason ? `: ${reason}` : ''}`);
      this.saveMetrics(this.loadMetrics(), next);
      return next;
    });
  }

  /**
   * Rewind to `phase` (the current phase or a completed one) so it runs again.
   * Writes a ROLLBACK advisory listing what to clean up by hand.
   */
  async rollback(phase: string): Promise<RunState> {
    return this.exclusive('rollback', async () => {
      const state = this.load('rollback');
      assertCanPerform(state, 'rollback');
      const next = rollbackToPhase(state, phase, this.config.phases);
      const reopened = state.completed_phases.filter((name) => !next.completed_phases.includes(name));

      const rolledBackAt = this.now().toISOString();
      const advisory = renderRollbackAdvisory({
        run_id: this.runId,
        from_phase: state.current_phase,
        to_phase: phase,
        rolled_back_at: rolledBackAt,
        completed_before: state.completed_phases,
        reopened
      });
      const advisoryPath = this.persist('rollback advisory', () =>
        this.store.writeAdvisory(rollbackFileName(rolledBackAt), advisory)
      );

      this.commit(next);

      this.emit({
        type: 'run_rolled_back',
        source: 'engine',
        payload: { from: state.current_phase, to: phase, reopened, advisory: advisoryPath }
      });
      this.logger.log(`[engine] ${this.runId} rolled back to ${phase}; see ${advisoryPath}`);
      this.saveMetrics(this.loadMetrics(), next);
      return next;
    });
  }

  /** Admin override: put the cursor on any enabled phase. */
  async jump(phase: string): Promise<RunState> {
    return this.exclusive('jump', async () => {
      const state = this.load('jump');
      assertCanPerform(state, 'jump');
      const next = jumpToPhase(state, phase, this.config.phases);

      this.commit(next);

      this.emit({
        type: 'phase_jumped',
        source: 'engine',
        payload: { from: state.current_phase, to: phase, previous_status: state.status }
      });
      this.logger.warn(`[engine] ${this.runId} jumped to phase ${phase} (admin)`);
      this.saveMetrics(this.loadMetrics(), next);
      return next;
    });
  }

  /** Persisted state, or a synthetic idle state for a run that was never started. */
  status(): RunState {
    if (!this.store.hasState()) {
      return createIdleState(this.runId);
    }
    return this.store.readState();
  }

  metrics(): RunMetrics {
    return this.loadMetrics().snapshot();
  }

  private async exclusive<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    // Checked and set before the first await, so back-to-back calls cannot both pass
    if (this.inFlight) {
      throw new ConcurrentTransitionError(this.runId, `${this.inFlight} in progress`);
    }
    this.inFlight = operation;
    try {
      this.store.acquireLock(operation);
      try {
        return await fn();
      } finally {
        this.store.releaseLock();
      }
    } finally {
      this.inFlight = null;
    }
  }

  private load(operation: string): RunState {
    if (!this.store.hasState()) {
      throw new InvalidStateError(operation, 'idle', 'run has not been started');
    }
    return this.store.readState();
  }

  private currentPhaseSpec(state: RunState): PhaseSpec {
    const name = state.current_phase;
    const phase = name ? findPhase(this.config, name) : undefined;
    if (!phase) {
      throw new InvalidStateError('locate phase', state.status, `unknown current phase ${name ?? 'null'}`);
    }
    return phase;
  }

  private commit(state: RunState): void {
    this.persist('run state', () => this.store.writeState(state));
  }

  private persist<T>(what: string, write: () => T): T {
    try {
      return write();
    } catch (error) {
      throw new PersistenceError(`Failed to write ${what} for run ${this.runId}`, error);
    }
  }

  private loadMetrics(): MetricsTracker {
    const saved = this.store.readMetrics();
    return saved
      ? MetricsTracker.restore(saved, { now: this.now })
      : new MetricsTracker(this.runId, { now: this.now });
  }

  /** Metrics follow the committed state; a failed write is logged, not fatal. */
  private saveMetrics(tracker: MetricsTracker, state: RunState): void {
    tracker.setStatus(state.status);
    if (state.status === 'completed') {
      tracker.finalize();
    }
    try {
      this.store.writeMetrics(tracker.snapshot(), tracker.toExposition());
    } catch (error) {
      this.logger.warn(
        `[engine] ${this.runId} could not write metrics: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  /** Timeline events are a log of committed work; a failed append is logged, not fatal. */
  private emit(event: Omit<Event, 'seq' | 'timestamp'>): void {
    try {
      this.store.appendEvent(event);
    } catch (error) {
      this.logger.warn(
        `[engine] ${this.runId} could not append ${event.type} event: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private recordDecision(phase: string, decidedAt: string, record: DecisionRecord): void {
    try {
      this.store.writeDecision(phase, decisionFileName(decidedAt), renderDecision(record));
    } catch (error) {
      this.logger.warn(
        `[engine] ${this.runId} could not write decision record: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private async runWorkers(phase: PhaseSpec, state: RunState, tracker: MetricsTracker): Promise<WorkerOutcome[]> {
    const context: WorkerContext = {
      run_id: this.runId,
      root_dir: this.rootDir,
      run_dir: this.store.path,
      phase_artifacts: state.phase_artifacts,
      metadata: state.metadata
    };
    const workers = phase.workers.map((id) => resolveWorker(this.config, id));

    const runOne = async (worker: WorkerSpec): Promise<WorkerOutcome> => {
      this.logger.log(`[worker] ${phase.name}/${worker.id} started (${worker.kind})`);
      const outcome = await this.executor.run(worker, phase.name, context);
      tracker.recordWorker(phase.name, worker.id, outcome.duration_ms, outcome.exit_code, outcome.retry_count);
      this.emit({
        type: 'worker_finished',
        source: 'engine',
        payload: {
          phase: phase.name,
          worker: worker.id,
          success: outcome.success,
          exit_code: outcome.exit_code,
          retry_count: outcome.retry_count,
          duration_ms: outcome.duration_ms,
          error_kind: outcome.error_kind,
          artifacts: outcome.artifacts
        }
      });
      const summary = outcome.success ? 'ok' : `failed (${outcome.error_kind ?? 'unknown'})`;
      this.logger.log(
        `[worker] ${phase.name}/${worker.id} ${summary} in ${outcome.duration_ms}ms` +
        (outcome.retry_count > 0 ? `, ${outcome.retry_count} retr${outcome.retry_count === 1 ? 'y' : 'ies'}` : '')
      );
      return outcome;
    };

    if (phase.parallel) {
      return runBounded(workers, phase.max_concurrency, runOne);
    }

    const outcomes: WorkerOutcome[] = [];
    for (const worker of workers) {
      const outcome = await runOne(worker);
      outcomes.push(outcome);
      if (!outcome.success && phase.stop_on_failure) {
        this.logger.warn(`[engine] ${phase.name}: stopping after ${worker.id} failed`);
        break;
      }
    }
    return outcomes;
  }

  private logPhaseResult(phase: string, validation: ValidationResult, next: RunState): void {
    switch (next.status) {
      case 'needs_revision':
        this.logger.warn(`[engine] ${this.runId} ${phase} needs revision (validation ${validation.status})`);
        break;
      case 'awaiting_approval':
        this.logger.log(`[engine] ${this.runId} ${phase} awaiting approval`);
        break;
      case 'completed':
        this.logger.log(`[engine] ${this.runId} ${phase} done; run completed`);
        break;
      default:
        this.logger.log(`[engine] ${this.runId} ${phase} done; next phase ${next.current_phase ?? '-'}`);
    }
  }
}

/** Error lines appended to RunState.errors when a phase falls short */
export function describeShortfall(
  phase: string,
  outcomes: WorkerOutcome[],
  validation: ValidationResult
): string[] {
  const errors: string[] = [];
  for (const outcome of outcomes) {
    if (outcome.success) continue;
    const detail = outcome.errors.length > 0 ? outcome.errors.join('; ') : 'failed';
    errors.push(`${phase}/${outcome.worker}: ${detail}`);
  }
  if (validation.missing.length > 0) {
    errors.push(`${phase}: missing artifacts (${validation.status}): ${validation.missing.join(', ')}`);
  }
  return errors;
}
