import { z } from 'zod';
import {
  PhaseMetrics,
  RUN_STATUSES,
  RunMetrics,
  RunStatus,
  ValidationStatus,
  WorkerMetrics
} from '../types/schemas.js';

const workerMetricsSchema = z.object({
  duration_ms: z.number(),
  exit_code: z.number().nullable(),
  retry_count: z.number().int().nonnegative()
});

const phaseMetricsSchema = z.object({
  started_at: z.string(),
  ended_at: z.string(),
  duration_ms: z.number(),
  attempts: z.number().int().positive(),
  validation_status: z.enum(['pass', 'partial', 'fail']),
  artifact_count: z.number().int().nonnegative(),
  workers: z.record(workerMetricsSchema)
});

export const runMetricsSchema = z.object({
  run_id: z.string(),
  started_at: z.string(),
  ended_at: z.string().nullable(),
  duration_ms: z.number().nullable(),
  status: z.enum(RUN_STATUSES),
  total_retries: z.number().int().nonnegative(),
  hygiene_score: z.number().nullable(),
  phases: z.record(phaseMetricsSchema)
});

const PARTIAL_PENALTY = 10;
const FAIL_PENALTY = 25;
const RETRY_PENALTY = 2;

/**
 * 100 minus penalties for shortfalls and retries, clamped to [0, 100].
 * Null until at least one phase has completed.
 */
export function computeHygieneScore(phases: Record<string, PhaseMetrics>, totalRetries: number): number | null {
  const list = Object.values(phases);
  if (list.length === 0) return null;
  let score = 100;
  for (const phase of list) {
    if (phase.validation_status === 'partial') score -= PARTIAL_PENALTY;
    if (phase.validation_status === 'fail') score -= FAIL_PENALTY;
  }
  score -= totalRetries * RETRY_PENALTY;
  return Math.min(100, Math.max(0, score));
}

interface InFlightPhase {
  started_at: string;
  started_ms: number;
  workers: Record<string, WorkerMetrics>;
}

export interface MetricsTrackerOptions {
  now?: () => Date;
}

/**
 * Accumulates timing and retry figures for one run.
 *
 * Phases only show up in a snapshot once `endPhase` has been called for them;
 * workers recorded for a phase still in flight are held back until then.
 */
export class MetricsTracker {
  private readonly runId: string;
  private readonly now: () => Date;
  private startedAt: string;
  private endedAt: string | null = null;
  private durationMs: number | null = null;
  private status: RunStatus = 'running';
  private totalRetries = 0;
  private completed: Record<string, PhaseMetrics> = {};
  private readonly inFlight = new Map<string, InFlightPhase>();

  constructor(runId: string, options: MetricsTrackerOptions = {}) {
    this.runId = runId;
    this.now = options.now ?? (() => new Date());
    this.startedAt = this.now().toISOString();
  }

  /** Rebuild a tracker from a persisted snapshot (e.g. in a later process). */
  static restore(snapshot: RunMetrics, options: MetricsTrackerOptions = {}): MetricsTracker {
    const tracker = new MetricsTracker(snapshot.run_id, options);
    tracker.startedAt = snapshot.started_at;
    tracker.endedAt = snapshot.ended_at;
    tracker.durationMs = snapshot.duration_ms;
    tracker.status = snapshot.status;
    tracker.totalRetries = snapshot.total_retries;
    tracker.completed = structuredClone(snapshot.phases);
    return tracker;
  }

  startPhase(name: string): void {
    const now = this.now();
    this.inFlight.set(name, {
      started_at: now.toISOString(),
      started_ms: now.getTime(),
      workers: {}
    });
  }

  recordWorker(phase: string, worker: string, durationMs: number, exitCode: number | null, retryCount: number): void {
    if (!this.inFlight.has(phase)) {
      this.startPhase(phase);
    }
    const entry = this.inFlight.get(phase);
    if (entry) {
      entry.workers[worker] = { duration_ms: durationMs, exit_code: exitCode, retry_count: retryCount };
    }
  }

  endPhase(name: string, validationStatus: ValidationStatus, artifactCount: number): void {
    const entry = this.inFlight.get(name);
    if (!entry) {
      return;
    }
    this.inFlight.delete(name);

    const now = this.now();
    const previous = this.completed[name];
    const retries = Object.values(entry.workers).reduce((sum, w) => sum + w.retry_count, 0);
    this.totalRetries += retries;
    this.completed[name] = {
      started_at: entry.started_at,
      ended_at: now.toISOString(),
      duration_ms: now.getTime() - entry.started_ms,
      attempts: (previous?.attempts ?? 0) + 1,
      validation_status: validationStatus,
      artifact_count: artifactCount,
      workers: entry.workers
    };
  }

  setStatus(status: RunStatus): void {
    this.status = status;
  }

  /** Stamp the run end time; called when the run completes. */
  finalize(): void {
    const now = this.now();
    this.endedAt = now.toISOString();
    this.durationMs = now.getTime() - new Date(this.startedAt).getTime();
  }

  snapshot(): RunMetrics {
    const phases = structuredClone(this.completed);
    return {
      run_id: this.runId,
      started_at: this.startedAt,
      ended_at: this.endedAt,
      duration_ms: this.durationMs,
      status: this.status,
      total_retries: this.totalRetries,
      hygiene_score: computeHygieneScore(phases, this.totalRetries),
      phases
    };
  }

  toJSON(): RunMetrics {
    return this.snapshot();
  }

  toExposition(): string {
    return renderExposition(this.snapshot());
  }
}

function escapeLabel(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function seconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}

/**
 * Flat `name{labels} value` lines for scrape-based monitoring.
 */
export function renderExposition(metrics: RunMetrics): string {
  const lines: string[] = [];
  const run = `run_id="${escapeLabel(metrics.run_id)}"`;

  for (const [phase, data] of Object.entries(metrics.phases)) {
    const labels = `${run},phase="${escapeLabel(phase)}"`;
    lines.push(`phaserun_phase_duration_seconds{${labels}} ${seconds(data.duration_ms)}`);
    lines.push(`phaserun_phase_attempts_total{${labels}} ${data.attempts}`);
    lines.push(`phaserun_phase_artifacts{${labels}} ${data.artifact_count}`);
    lines.push(`phaserun_phase_validation_pass{${labels}} ${data.validation_status === 'pass' ? 1 : 0}`);

    for (const [worker, w] of Object.entries(data.workers)) {
      const workerLabels = `${labels},worker="${escapeLabel(worker)}"`;
      lines.push(`phaserun_worker_duration_seconds{${workerLabels}} ${seconds(w.duration_ms)}`);
      if (w.exit_code !== null) {
        lines.push(`phaserun_worker_exit_code{${workerLabels}} ${w.exit_code}`);
      }
      lines.push(`phaserun_worker_retries_total{${workerLabels}} ${w.retry_count}`);
    }
  }

  lines.push(`phaserun_retries_total{${run}} ${metrics.total_retries}`);
  if (metrics.hygiene_score !== null) {
    lines.push(`phaserun_hygiene_score{${run}} ${metrics.hygiene_score.toFixed(1)}`);
  }
  if (metrics.duration_ms !== null) {
    lines.push(`phaserun_run_duration_seconds{${run}} ${seconds(metrics.duration_ms)}`);
  }
  lines.push(`phaserun_run_completed{${run}} ${metrics.status === 'completed' ? 1 : 0}`);

  return `${lines.join('\n')}\n`;
}
