import { z } from 'zod';

export const RUN_STATUSES = [
  'idle',
  'running',
  'awaiting_approval',
  'needs_revision',
  'completed',
  'aborted'
] as const;

export type RunStatus = typeof RUN_STATUSES[number];

export type ValidationStatus = 'pass' | 'partial' | 'fail';

/**
 * Persisted run state. Parsed with zod on every read so a hand-edited or
 * truncated state.json is reported instead of flowing into the engine.
 */
export const runStateSchema = z.object({
  run_id: z.string().min(1),
  status: z.enum(RUN_STATUSES),
  current_phase: z.string().nullable(),
  completed_phases: z.array(z.string()),
  phase_artifacts: z.record(z.array(z.string())),
  awaiting_approval: z.boolean(),
  approval_phase: z.string().nullable(),
  metadata: z.record(z.unknown()),
  errors: z.array(z.string()),
  /** Attempt number of the current phase (1 on first advance, resets when the phase changes) */
  phase_attempt: z.number().int().nonnegative(),
  created_at: z.string(),
  updated_at: z.string()
});

export type RunState = z.infer<typeof runStateSchema>;

export interface ValidationResult {
  status: ValidationStatus;
  /** Patterns the phase declared */
  required: string[];
  /** Patterns with at least one non-empty matching file */
  found: string[];
  /** Patterns with no non-empty matching file */
  missing: string[];
  /** Every non-empty matching file, relative to the project root, sorted */
  files: string[];
}

/**
 * Closed set of failure kinds a worker call can end with.
 * Retry eligibility is decided from this, not from free-form text.
 */
export type ErrorKind =
  | 'timeout'
  | 'transient_exit'
  | 'rate_limit'
  | 'network'
  | 'server_error'
  | 'worker_failed'
  | 'spawn_failed'
  | 'http_error'
  | 'invalid_response';

export interface WorkerOutcome {
  worker: string;
  success: boolean;
  artifacts: string[];
  notes: string;
  errors: string[];
  exit_code: number | null;
  duration_ms: number;
  retry_count: number;
  error_kind: ErrorKind | null;
}

export interface PhaseOutcome {
  phase: string;
  success: boolean;
  worker_outcomes: WorkerOutcome[];
  validation: ValidationResult;
  requires_approval: boolean;
  awaiting_approval: boolean;
  completed_at: string;
}

export interface WorkerMetrics {
  duration_ms: number;
  exit_code: number | null;
  retry_count: number;
}

export interface PhaseMetrics {
  started_at: string;
  ended_at: string;
  duration_ms: number;
  /** How many times this phase has been run to completion (retries after revision included) */
  attempts: number;
  validation_status: ValidationStatus;
  artifact_count: number;
  workers: Record<string, WorkerMetrics>;
}

export interface RunMetrics {
  run_id: string;
  started_at: string;
  ended_at: string | null;
  duration_ms: number | null;
  status: RunStatus;
  total_retries: number;
  hygiene_score: number | null;
  phases: Record<string, PhaseMetrics>;
}

export interface Event {
  seq: number;
  timestamp: string;
  type: string;
  payload: unknown;
  source: string;
  correlation_id?: string;
}
