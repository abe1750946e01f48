import type { WorkerSpec } from '../config/schema.js';
import type { WorkerOutcome } from '../types/schemas.js';

/**
 * What a worker may know about the run it is part of.
 */
export interface WorkerContext {
  run_id: string;
  /** Project root; artifact paths are relative to it */
  root_dir: string;
  /** Run directory (transcripts are written below it) */
  run_dir: string;
  /** Artifacts recorded by phases that already completed */
  phase_artifacts: Record<string, string[]>;
  metadata: Record<string, unknown>;
}

/** Result of one successful call, before it is folded into a WorkerOutcome. */
export interface AttemptResult {
  exit_code: number | null;
  output: string;
  artifacts: string[];
}

export interface WorkerExecutor {
  /** Never rejects for worker failures; failures come back as `success: false`. */
  run(worker: WorkerSpec, phase: string, context: WorkerContext): Promise<WorkerOutcome>;
}
