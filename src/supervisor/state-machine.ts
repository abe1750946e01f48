import { PhaseSpec } from '../config/schema.js';
import { InvalidStateError } from '../types/errors.js';
import { RunState, RunStatus } from '../types/schemas.js';

export type EngineOperation = 'advance' | 'approve' | 'reject' | 'resume' | 'abort' | 'rollback' | 'jump';

/** Statuses each engine operation may be called from */
const allowedFrom: Record<EngineOperation, readonly RunStatus[]> = {
  advance: ['running'],
  approve: ['awaiting_approval'],
  reject: ['awaiting_approval'],
  resume: ['needs_revision', 'aborted'],
  abort: ['running', 'awaiting_approval', 'needs_revision'],
  rollback: ['running', 'needs_revision', 'aborted', 'completed'],
  jump: ['running', 'needs_revision', 'aborted', 'completed']
};

export function canPerform(status: RunStatus, operation: EngineOperation): boolean {
  return allowedFrom[operation].includes(status);
}

export function assertCanPerform(state: RunState, operation: EngineOperation): void {
  if (!canPerform(state.status, operation)) {
    const expected = allowedFrom[operation].join(' or ');
    throw new InvalidStateError(operation, state.status, `requires ${expected}`);
  }
}

export function firstEnabledPhase(phases: PhaseSpec[]): string | null {
  return phases.find((p) => p.enabled)?.name ?? null;
}

/**
 * Next enabled phase after `current` in the configured order, or null when
 * `current` was the last one.
 */
export function nextEnabledPhase(phases: PhaseSpec[], current: string): string | null {
  const index = phases.findIndex((p) => p.name === current);
  if (index === -1) {
    return null;
  }
  return phases.slice(index + 1).find((p) => p.enabled)?.name ?? null;
}

export interface InitStateInput {
  run_id: string;
  first_phase: string | null;
  metadata: Record<string, unknown>;
}

/**
 * Fresh state for a started run. With no enabled phase there is nothing to
 * do, so the run is born completed.
 */
export function createInitialState(input: InitStateInput): RunState {
  const now = new Date().toISOString();
  return {
    run_id: input.run_id,
    status: input.first_phase ? 'running' : 'completed',
    current_phase: input.first_phase,
    completed_phases: [],
    phase_artifacts: {},
    awaiting_approval: false,
    approval_phase: null,
    metadata: { ...input.metadata },
    errors: [],
    phase_attempt: 0,
    created_at: now,
    updated_at: now
  };
}

/** What `status()` reports for a run that was never started. Never persisted. */
export function createIdleState(runId: string): RunState {
  const now = new Date().toISOString();
  return {
    run_id: runId,
    status: 'idle',
    current_phase: null,
    completed_phases: [],
    phase_artifacts: {},
    awaiting_approval: false,
    approval_phase: null,
    metadata: {},
    errors: [],
    phase_attempt: 0,
    created_at: now,
    updated_at: now
  };
}

export function beginPhaseAttempt(state: RunState): RunState {
  return {
    ...state,
    phase_attempt: state.phase_attempt + 1,
    updated_at: new Date().toISOString()
  };
}

export function markNeedsRevision(state: RunState, errors: string[]): RunState {
  return {
    ...state,
    status: 'needs_revision',
    awaiting_approval: false,
    approval_phase: null,
    errors: [...state.errors, ...errors],
    updated_at: new Date().toISOString()
  };
}

function withoutPhaseArtifacts(
  artifacts: RunState['phase_artifacts'],
  phase: string | null
): RunState['phase_artifacts'] {
  if (!phase) return artifacts;
  const { [phase]: _dropped, ...rest } = artifacts;
  return rest;
}

/**
 * Suspend on the current phase. The artifacts it produced are held under its
 * name until approve() commits them or reject()/abort() drops them.
 */
export function markAwaitingApproval(state: RunState, pendingArtifacts: string[]): RunState {
  const phase = state.current_phase;
  if (!phase) {
    throw new InvalidStateError('await approval', state.status, 'no current phase');
  }
  return {
    ...state,
    status: 'awaiting_approval',
    awaiting_approval: true,
    approval_phase: phase,
    phase_artifacts: { ...state.phase_artifacts, [phase]: [...pendingArtifacts] },
    updated_at: new Date().toISOString()
  };
}

/**
 * Commit the current phase: record its artifacts and move the cursor.
 * Shared by `advance()` (no gate) and `approve()`.
 */
export function completeCurrentPhase(state: RunState, artifacts: string[], nextPhase: string | null): RunState {
  const phase = state.current_phase;
  if (!phase) {
    throw new InvalidStateError('complete phase', state.status, 'no current phase');
  }
  return {
    ...state,
    status: nextPhase ? 'running' : 'completed',
    current_phase: nextPhase,
    completed_phases: [...state.completed_phases, phase],
    phase_artifacts: { ...state.phase_artifacts, [phase]: [...artifacts] },
    awaiting_approval: false,
    approval_phase: null,
    phase_attempt: 0,
    updated_at: new Date().toISOString()
  };
}

export function rejectApproval(state: RunState, reason: string): RunState {
  const next = markNeedsRevision(state, [`Rejected ${state.current_phase ?? 'phase'}: ${reason}`]);
  return { ...next, phase_artifacts: withoutPhaseArtifacts(state.phase_artifacts, state.approval_phase) };
}

export function resumeRun(state: RunState): RunState {
  return {
    ...state,
    status: 'running',
    updated_at: new Date().toISOString()
  };
}

export function abortRun(state: RunState, reason?: string): RunState {
  return {
    ...state,
    status: 'aborted',
    awaiting_approval: false,
    approval_phase: null,
    phase_artifacts: withoutPhaseArtifacts(state.phase_artifacts, state.approval_phase),
    errors: reason ? [...state.errors, `Aborted: ${reason}`] : state.errors,
    updated_at: new Date().toISOString()
  };
}

function enabledNames(phases: PhaseSpec[]): string[] {
  return phases.filter((p) => p.enabled).map((p) => p.name);
}

function enabledIndex(phases: PhaseSpec[], operation: EngineOperation, state: RunState, phase: string): number {
  const index = enabledNames(phases).indexOf(phase);
  if (index === -1) {
    throw new InvalidStateError(operation, state.status, `${phase} is not an enabled phase`);
  }
  return index;
}

/**
 * Move the cursor back to `phase`, which must be the current phase or one
 * already completed. Phases from `phase` onwards are no longer completed and
 * their recorded artifacts are dropped; files on disk are left alone.
 */
export function rollbackToPhase(state: RunState, phase: string, phases: PhaseSpec[]): RunState {
  const target = enabledIndex(phases, 'rollback', state, phase);
  if (phase !== state.current_phase && !state.completed_phases.includes(phase)) {
    throw new InvalidStateError('rollback', state.status, `${phase} has not been reached yet`);
  }

  const enabled = enabledNames(phases);
  const kept = state.completed_phases.filter((name) => {
    const index = enabled.indexOf(name);
    return index !== -1 && index < target;
  });
  const artifacts: RunState['phase_artifacts'] = {};
  for (const name of kept) {
    const recorded = state.phase_artifacts[name];
    if (recorded) artifacts[name] = recorded;
  }

  return {
    ...state,
    status: 'running',
    current_phase: phase,
    completed_phases: kept,
    phase_artifacts: artifacts,
    awaiting_approval: false,
    approval_phase: null,
    phase_attempt: 0,
    updated_at: new Date().toISOString()
  };
}

/**
 * Put the cursor on any enabled phase. Phases skipped over stay uncompleted;
 * if `phase` was completed before, it is taken off the completed list so it
 * can be committed again.
 */
export function jumpToPhase(state: RunState, phase: string, phases: PhaseSpec[]): RunState {
  enabledIndex(phases, 'jump', state, phase);
  return {
    ...state,
    status: 'running',
    current_phase: phase,
    completed_phases: state.completed_phases.filter((name) => name !== phase),
    phase_artifacts: withoutPhaseArtifacts(state.phase_artifacts, phase),
    awaiting_approval: false,
    approval_phase: null,
    phase_attempt: 0,
    updated_at: new Date().toISOString()
  };
}
