import { describe, it, expect } from 'vitest';
import { computeHygieneScore, MetricsTracker, renderExposition, runMetricsSchema } from '../../src/metrics/tracker.js';
import { PhaseMetrics } from '../../src/types/schemas.js';

function fakeClock(): { now: () => Date; set: (ms: number) => void } {
  let current = 0;
  return {
    now: () => new Date(current),
    set: (ms: number) => {
      current = ms;
    }
  };
}

function phase(status: PhaseMetrics['validation_status']): PhaseMetrics {
  return {
    started_at: '1970-01-01T00:00:00.000Z',
    ended_at: '1970-01-01T00:00:01.000Z',
    duration_ms: 1000,
    attempts: 1,
    validation_status: status,
    artifact_count: 0,
    workers: {}
  };
}

describe('computeHygieneScore', () => {
  it('is null before any phase completes', () => {
    expect(computeHygieneScore({}, 0)).toBeNull();
  });

  it('subtracts penalties for shortfalls', () => {
    expect(computeHygieneScore({ a: phase('pass'), b: phase('partial'), c: phase('fail') }, 0)).toBe(65);
  });

  it('subtracts two points per retry', () => {
    expect(computeHygieneScore({ a: phase('pass') }, 3)).toBe(94);
  });

  it('clamps at zero', () => {
    expect(computeHygieneScore({ a: phase('fail') }, 60)).toBe(0);
  });
});

describe('MetricsTracker', () => {
  it('records phase and worker figures', () => {
    const clock = fakeClock();
    const tracker = new MetricsTracker('r1', { now: clock.now });

    clock.set(1000);
    tracker.startPhase('build');
    tracker.recordWorker('build', 'w', 500, 0, 1);
    clock.set(3000);
    tracker.endPhase('build', 'pass', 2);

    const snapshot = tracker.snapshot();
    expect(snapshot.started_at).toBe('1970-01-01T00:00:00.000Z');
    expect(snapshot.total_retries).toBe(1);
    expect(snapshot.hygiene_score).toBe(98);
    expect(snapshot.phases.build).toEqual({
      started_at: '1970-01-01T00:00:01.000Z',
      ended_at: '1970-01-01T00:00:03.000Z',
      duration_ms: 2000,
      attempts: 1,
      validation_status: 'pass',
      artifact_count: 2,
      workers: { w: { duration_ms: 500, exit_code: 0, retry_count: 1 } }
    });
  });

  it('leaves phases out of the snapshot until they end', () => {
    const tracker = new MetricsTracker('r1', { now: fakeClock().now });
    tracker.recordWorker('build', 'w', 10, 0, 0);

    expect(tracker.snapshot().phases).toEqual({});
    expect(tracker.snapshot().hygiene_score).toBeNull();
  });

  it('ignores endPhase for a phase that never started', () => {
    const tracker = new MetricsTracker('r1', { now: fakeClock().now });
    tracker.endPhase('ghost', 'pass', 0);
    expect(tracker.snapshot().phases).toEqual({});
  });

  it('counts repeated attempts of a phase', () => {
    const clock = fakeClock();
    const tracker = new MetricsTracker('r1', { now: clock.now });

    tracker.startPhase('build');
    tracker.endPhase('build', 'fail', 0);
    tracker.startPhase('build');
    tracker.endPhase('build', 'pass', 1);

    expect(tracker.snapshot().phases.build.attempts).toBe(2);
    expect(tracker.snapshot().phases.build.validation_status).toBe('pass');
  });

  it('stamps the end of the run on finalize', () => {
    const clock = fakeClock();
    const tracker = new MetricsTracker('r1', { now: clock.now });

    clock.set(10_000);
    tracker.setStatus('completed');
    tracker.finalize();

    const snapshot = tracker.snapshot();
    expect(snapshot.status).toBe('completed');
    expect(snapshot.ended_at).toBe('1970-01-01T00:00:10.000Z');
    expect(snapshot.duration_ms).toBe(10_000);
  });

  it('restores from a persisted snapshot', () => {
    const clock = fakeClock();
    const first = new MetricsTracker('r1', { now: clock.now });
    first.startPhase('plan');
    first.recordWorker('plan', 'w', 5, 0, 2);
    first.endPhase('plan', 'partial', 1);

    const persisted = runMetricsSchema.parse(JSON.parse(JSON.stringify(first)));
    const second = MetricsTracker.restore(persisted, { now: clock.now });
    second.startPhase('plan');
    second.endPhase('plan', 'pass', 1);

    const snapshot = second.snapshot();
    expect(snapshot.total_retries).toBe(2);
    expect(snapshot.phases.plan.attempts).toBe(2);
    expect(snapshot.hygiene_score).toBe(96);
  });

  it('hands out snapshots that do not alias internal state', () => {
    const tracker = new MetricsTracker('r1', { now: fakeClock().now });
    tracker.startPhase('plan');
    tracker.endPhase('plan', 'pass', 0);

    tracker.snapshot().phases.plan.attempts = 99;

    expect(tracker.snapshot().phases.plan.attempts).toBe(1);
  });
});

describe('renderExposition', () => {
  it('renders one line per figure', () => {
    const clock = fakeClock();
    const tracker = new MetricsTracker('r1', { now: clock.now });
    clock.set(1000);
    tracker.startPhase('build');
    tracker.recordWorker('build', 'w', 500, 0, 1);
    clock.set(3000);
    tracker.endPhase('build', 'pass', 2);

    expect(tracker.toExposition()).toBe(
      [
        'phaserun_phase_duration_seconds{run_id="r1",phase="build"} 2.000',
        'phaserun_phase_attempts_total{run_id="r1",phase="build"} 1',
        'phaserun_phase_artifacts{run_id="r1",phase="build"} 2',
        'phaserun_phase_validation_pass{run_id="r1",phase="build"} 1',
        'phaserun_worker_duration_seconds{run_id="r1",phase="build",worker="w"} 0.500',
        'phaserun_worker_exit_code{run_id="r1",phase="build",worker="w"} 0',
        'phaserun_worker_retries_total{run_id="r1",phase="build",worker="w"} 1',
        'phaserun_retries_total{run_id="r1"} 1',
        'phaserun_hygiene_score{run_id="r1"} 98.0',
        'phaserun_run_completed{run_id="r1"} 0',
        ''
      ].join('\n')
    );
  });

  it('omits exit codes that are unknown and adds run duration once finished', () => {
    const text = renderExposition({
      run_id: 'r2',
      started_at: '1970-01-01T00:00:00.000Z',
      ended_at: '1970-01-01T00:00:04.000Z',
      duration_ms: 4000,
      status: 'completed',
      total_retries: 0,
      hygiene_score: 100,
      phases: {
        review: {
          ...phase('pass'),
          workers: { critic: { duration_ms: 1200, exit_code: null, retry_count: 0 } }
        }
      }
    });

    const lines = text.trimEnd().split('\n');
    expect(lines).not.toContain('phaserun_worker_exit_code{run_id="r2",phase="review",worker="critic"} 0');
    expect(lines).toContain('phaserun_worker_duration_seconds{run_id="r2",phase="review",worker="critic"} 1.200');
    expect(lines).toContain('phaserun_run_duration_seconds{run_id="r2"} 4.000');
    expect(lines[lines.length - 1]).toBe('phaserun_run_completed{run_id="r2"} 1');
    expect(lines.filter((line) => line.startsWith('phaserun_worker_exit_code'))).toEqual([]);
  });

  it('escapes label values', () => {
    const text = renderExposition({
      run_id: 'a"b\\c',
      started_at: '1970-01-01T00:00:00.000Z',
      ended_at: null,
      duration_ms: null,
      status: 'running',
      total_retries: 0,
      hygiene_score: null,
      phases: {}
    });

    expect(text).toBe('phaserun_retries_total{run_id="a\\"b\\\\c"} 0\nphaserun_run_completed{run_id="a\\"b\\\\c"} 0\n');
  });
});
