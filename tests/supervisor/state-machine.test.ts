import { describe, it, expect } from 'vitest';
import { PhaseSpec } from '../../src/config/schema.js';
import {
  abortRun,
  assertCanPerform,
  beginPhaseAttempt,
  canPerform,
  completeCurrentPhase,
  createIdleState,
  createInitialState,
  EngineOperation,
  firstEnabledPhase,
  markAwaitingApproval,
  markNeedsRevision,
  nextEnabledPhase,
  jumpToPhase,
  rejectApproval,
  resumeRun,
  rollbackToPhase
} from '../../src/supervisor/state-machine.js';
import { InvalidStateError } from '../../src/types/errors.js';
import { RUN_STATUSES, RunStatus } from '../../src/types/schemas.js';

function phase(name: string, enabled = true): PhaseSpec {
  return {
    name,
    enabled,
    workers: [],
    parallel: false,
    max_concurrency: 1,
    stop_on_failure: true,
    requires_approval: false,
    artifacts: []
  };
}

const running = () => createInitialState({ run_id: 'r1', first_phase: 'plan', metadata: {} });

describe('operation table', () => {
  const expected: Array<[EngineOperation, RunStatus[]]> = [
    ['advance', ['running']],
    ['approve', ['awaiting_approval']],
    ['reject', ['awaiting_approval']],
    ['resume', ['needs_revision', 'aborted']],
    ['abort', ['running', 'awaiting_approval', 'needs_revision']],
    ['rollback', ['running', 'needs_revision', 'completed', 'aborted']],
    ['jump', ['running', 'needs_revision', 'completed', 'aborted']]
  ];

  for (const [operation, statuses] of expected) {
    it(`allows ${operation} only from ${statuses.join(', ')}`, () => {
      expect(RUN_STATUSES.filter((status) => canPerform(status, operation))).toEqual(statuses);
    });
  }

  it('throws InvalidStateError naming the allowed statuses', () => {
    const state = { ...running(), status: 'completed' as const };
    expect(() => assertCanPerform(state, 'resume')).toThrow(InvalidStateError);
    expect(() => assertCanPerform(state, 'resume')).toThrow(
      'Cannot resume while run is completed: requires needs_revision or aborted'
    );
  });
});

describe('phase order', () => {
  const phases = [phase('plan'), phase('draft', false), phase('build'), phase('ship', false)];

  it('finds the first enabled phase', () => {
    expect(firstEnabledPhase(phases)).toBe('plan');
    expect(firstEnabledPhase([phase('a', false)])).toBeNull();
  });

  it('skips disabled phases when moving on', () => {
    expect(nextEnabledPhase(phases, 'plan')).toBe('build');
    expect(nextEnabledPhase(phases, 'build')).toBeNull();
    expect(nextEnabledPhase(phases, 'unknown')).toBeNull();
  });
});

describe('transitions', () => {
  it('starts running on the first phase', () => {
    const state = running();
    expect(state.status).toBe('running');
    expect(state.current_phase).toBe('plan');
    expect(state.phase_attempt).toBe(0);
  });

  it('starts completed when there is no phase to run', () => {
    const state = createInitialState({ run_id: 'r1', first_phase: null, metadata: {} });
    expect(state.status).toBe('completed');
    expect(state.current_phase).toBeNull();
  });

  it('reports idle for a run that was never started', () => {
    expect(createIdleState('r9')).toMatchObject({ run_id: 'r9', status: 'idle', current_phase: null });
  });

  it('counts attempts and resets them on completion', () => {
    const attempted = beginPhaseAttempt(beginPhaseAttempt(running()));
    expect(attempted.phase_attempt).toBe(2);

    const done = completeCurrentPhase(attempted, ['plan.md'], 'build');
    expect(done).toMatchObject({
      status: 'running',
      current_phase: 'build',
      completed_phases: ['plan'],
      phase_artifacts: { plan: ['plan.md'] },
      phase_attempt: 0
    });
  });

  it('completes the run after the last phase', () => {
    const done = completeCurrentPhase(running(), [], null);
    expect(done.status).toBe('completed');
    expect(done.current_phase).toBeNull();
  });

  it('appends errors when a phase needs revision', () => {
    const state = markNeedsRevision({ ...running(), errors: ['earlier'] }, ['plan: missing artifacts']);
    expect(state.status).toBe('needs_revision');
    expect(state.errors).toEqual(['earlier', 'plan: missing artifacts']);
    expect(state.current_phase).toBe('plan');
  });

  it('holds pending artifacts while awaiting approval', () => {
    const state = markAwaitingApproval(running(), ['plan.md']);
    expect(state).toMatchObject({
      status: 'awaiting_approval',
      awaiting_approval: true,
      approval_phase: 'plan',
      phase_artifacts: { plan: ['plan.md'] }
    });
  });

  it('drops pending artifacts and records the reason on rejection', () => {
    const state = rejectApproval(markAwaitingApproval(running(), ['plan.md']), 'too thin');
    expect(state).toMatchObject({
      status: 'needs_revision',
      awaiting_approval: false,
      approval_phase: null,
      phase_artifacts: {},
      errors: ['Rejected plan: too thin']
    });
  });

  it('resumes to running on the same phase', () => {
    const state = resumeRun(markNeedsRevision(running(), ['x']));
    expect(state.status).toBe('running');
    expect(state.current_phase).toBe('plan');
  });

  it('aborts with an optional reason', () => {
    const waiting = markAwaitingApproval(running(), ['plan.md']);
    const aborted = abortRun(waiting, 'wrong branch');
    expect(aborted).toMatchObject({
      status: 'aborted',
      awaiting_approval: false,
      approval_phase: null,
      phase_artifacts: {},
      errors: ['Aborted: wrong branch']
    });
    expect(abortRun(running()).errors).toEqual([]);
  });

  it('does not mutate its input', () => {
    const state = running();
    const before = structuredClone(state);
    markAwaitingApproval(state, ['a']);
    completeCurrentPhase(state, ['a'], 'build');
    abortRun(state, 'x');
    expect(state).toEqual(before);
  });
});

describe('moving the cursor', () => {
  const phases = [phase('plan'), phase('draft', false), phase('build'), phase('ship')];

  function shipped() {
    const planned = completeCurrentPhase(running(), ['plan.md'], 'build');
    return completeCurrentPhase(planned, ['dist/app.js'], 'ship');
  }

  it('rolls back to a completed phase and forgets what came after it', () => {
    const state = rollbackToPhase(markNeedsRevision(shipped(), ['x']), 'build', phases);
    expect(state).toMatchObject({
      status: 'running',
      current_phase: 'build',
      completed_phases: ['plan'],
      phase_artifacts: { plan: ['plan.md'] },
      errors: ['x']
    });
  });

  it('rolls back to the current phase without reopening anything', () => {
    const state = rollbackToPhase(shipped(), 'ship', phases);
    expect(state.completed_phases).toEqual(['plan', 'build']);
    expect(state.phase_artifacts).toEqual({ plan: ['plan.md'], build: ['dist/app.js'] });
  });

  it('only rolls back to enabled phases already reached', () => {
    expect(() => rollbackToPhase(running(), 'ship', phases)).toThrow('ship has not been reached yet');
    expect(() => rollbackToPhase(shipped(), 'draft', phases)).toThrow('draft is not an enabled phase');
  });

  it('jumps to any enabled phase and reopens it if it was completed', () => {
    expect(jumpToPhase(running(), 'ship', phases)).toMatchObject({
      current_phase: 'ship',
      completed_phases: []
    });
    expect(jumpToPhase(shipped(), 'plan', phases)).toMatchObject({
      current_phase: 'plan',
      completed_phases: ['build'],
      phase_artifacts: { build: ['dist/app.js'] }
    });
    expect(() => jumpToPhase(running(), 'draft', phases)).toThrow(InvalidStateError);
  });
});
