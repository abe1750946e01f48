import { z } from 'zod';

/** Exit codes that mean "try again later" unless the config says otherwise */
export const DEFAULT_TRANSIENT_EXIT_CODES = [75, 101, 111, 125];

/**
 * Legacy substrings still honoured for transient classification.
 * Workers that predate structured error kinds only report failures as text.
 */
export const DEFAULT_TRANSIENT_MESSAGES = ['rate limit', 'transient network', 'timeout'];

export const DEFAULT_WORKER_TIMEOUT_MS = 30 * 60 * 1000;

/** Largest delay setTimeout honours; anything above fires after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;

const timerMs = () => z.number().int().positive().max(MAX_TIMER_MS);

const retrySchema = z.object({
  max_retries: z.number().int().nonnegative().default(2),
  base_delay_ms: z.number().nonnegative().default(700),
  backoff_multiplier: z.number().positive().default(2),
  /** Fraction of the computed delay applied as +/- random perturbation */
  jitter: z.number().min(0).max(1).default(0.25),
  transient_exit_codes: z.array(z.number().int()).default(DEFAULT_TRANSIENT_EXIT_CODES),
  transient_messages: z.array(z.string()).default(DEFAULT_TRANSIENT_MESSAGES)
});

const timeoutsSchema = z.object({
  worker_ms: timerMs().default(DEFAULT_WORKER_TIMEOUT_MS)
});

const localWorkerSchema = z.object({
  kind: z.literal('local'),
  bin: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).default({}),
  /** Working directory relative to the project root */
  cwd: z.string().optional(),
  /** Written to the child's stdin */
  request: z.string().optional(),
  timeout_ms: timerMs().optional()
});

const remoteWorkerSchema = z.object({
  kind: z.literal('remote'),
  endpoint: z.string().url(),
  method: z.enum(['POST', 'PUT']).default('POST'),
  headers: z.record(z.string()).default({}),
  /** Name of the env var holding a bearer token; the token itself never lives in config */
  api_key_env: z.string().optional(),
  request: z.string().default(''),
  timeout_ms: timerMs().optional()
});

const workerSchema = z.discriminatedUnion('kind', [localWorkerSchema, remoteWorkerSchema]);

/** Phase names and worker ids become directory names under the run dir */
const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const phaseSchema = z.object({
  name: z.string().regex(NAME_PATTERN, 'must be letters, digits, dot, dash or underscore'),
  enabled: z.boolean().default(true),
  workers: z.array(z.string()).default([]),
  parallel: z.boolean().default(false),
  max_concurrency: z.number().int().positive().default(1),
  stop_on_failure: z.boolean().default(true),
  requires_approval: z.boolean().default(false),
  artifacts: z.array(z.string()).default([])
});

export const workflowConfigSchema = z
  .object({
    phases: z.array(phaseSchema).min(1),
    workers: z.record(workerSchema).default({}),
    retry: retrySchema.default({}),
    timeouts: timeoutsSchema.default({})
  })
  .superRefine((config, ctx) => {
    for (const workerId of Object.keys(config.workers)) {
      if (!NAME_PATTERN.test(workerId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['workers', workerId],
          message: `Invalid worker id "${workerId}": must be letters, digits, dot, dash or underscore`
        });
      }
    }

    const seen = new Set<string>();
    config.phases.forEach((phase, index) => {
      if (seen.has(phase.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['phases', index, 'name'],
          message: `Duplicate phase name: ${phase.name}`
        });
      }
      seen.add(phase.name);

      phase.workers.forEach((workerId, workerIndex) => {
        if (!(workerId in config.workers)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['phases', index, 'workers', workerIndex],
            message: `Phase "${phase.name}" references unknown worker "${workerId}"`
          });
        }
      });
    });
  });

export type WorkflowConfig = z.infer<typeof workflowConfigSchema>;

export type PhaseSpec = z.infer<typeof phaseSchema>;

export type RetryPolicy = z.infer<typeof retrySchema>;

export type LocalWorkerConfig = z.infer<typeof localWorkerSchema>;

export type RemoteWorkerConfig = z.infer<typeof remoteWorkerSchema>;

export type WorkerConfig = z.infer<typeof workerSchema>;

/** A worker config bound to its id, as handed to the executor */
export type WorkerSpec = WorkerConfig & { id: string };

export function resolveWorker(config: WorkflowConfig, workerId: string): WorkerSpec {
  const worker = config.workers[workerId];
  if (!worker) {
    throw new Error(`Unknown worker: ${workerId}`);
  }
  return { ...worker, id: workerId };
}

export function enabledPhases(config: WorkflowConfig): PhaseSpec[] {
  return config.phases.filter((phase) => phase.enabled);
}

export function findPhase(config: WorkflowConfig, name: string): PhaseSpec | undefined {
  return config.phases.find((phase) => phase.name === name);
}
