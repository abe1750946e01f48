import { RunStore } from '../store/run-store.js';
import { getStatePaths } from '../store/runs-root.js';
import { Event } from '../types/schemas.js';
import { EXIT_OK, printJson, resolveRun, RunCommandOptions } from './shared.js';

export interface LogOptions extends RunCommandOptions {
  /** Only events of this type */
  type?: string;
  /** Show the last N events (default 50) */
  limit?: number;
  json?: boolean;
}

export const DEFAULT_LOG_LIMIT = 50;

export function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`Invalid --limit "${value}": expected a positive integer`);
  }
  return limit;
}

function field(payload: unknown, key: string): string {
  if (!payload || typeof payload !== 'object') return '?';
  const value: unknown = Reflect.get(payload, key);
  if (value === null || value === undefined) return '-';
  return Array.isArray(value) ? value.join(', ') : String(value);
}

export function formatEvent(event: Event): string {
  const prefix = `#${event.seq} ${event.timestamp} ${event.type}`;
  const p = event.payload;

  switch (event.type) {
    case 'run_started':
      return `${prefix} - phase: ${field(p, 'current_phase')}, status: ${field(p, 'status')}`;
    case 'phase_started':
      return `${prefix} → ${field(p, 'phase')} (attempt ${field(p, 'attempt')})`;
    case 'worker_finished': {
      const ok = field(p, 'success') === 'true' ? 'ok' : `failed (${field(p, 'error_kind')})`;
      return `${prefix} - ${field(p, 'phase')}/${field(p, 'worker')} ${ok} in ${field(p, 'duration_ms')}ms`;
    }
    case 'worker_retry':
      return `${prefix} - ${field(p, 'phase')}/${field(p, 'worker')} attempt ${field(p, 'attempt')}: ${field(p, 'error')}`;
    case 'phase_finished':
      return `${prefix} - ${field(p, 'phase')}: ${field(p, 'validation_status')}, status ${field(p, 'status')}, next ${field(p, 'next_phase')}`;
    case 'approval_granted':
      return `${prefix} - ${field(p, 'phase')}, next ${field(p, 'next_phase')}`;
    case 'approval_rejected':
      return `${prefix} - ${field(p, 'phase')}: ${field(p, 'reason')}`;
    case 'run_resumed':
      return `${prefix} - from ${field(p, 'from')} at ${field(p, 'phase')}`;
    case 'run_aborted':
      return `${prefix} - from ${field(p, 'from')}, reason: ${field(p, 'reason')}`;
    case 'run_rolled_back':
    case 'phase_jumped':
      return `${prefix} - ${field(p, 'from')} → ${field(p, 'to')}`;
    default:
      return prefix;
  }
}

/**
 * Print the tail of a run's timeline. Read-only, like status.
 */
export async function logCommand(options: LogOptions): Promise<number> {
  const runId = resolveRun(options);
  const store = RunStore.open(runId, getStatePaths(options.repo, options.stateDir).runs_dir);

  const events = store
    .readTimeline()
    .filter((event) => !options.type || event.type === options.type)
    .slice(-(options.limit ?? DEFAULT_LOG_LIMIT));

  if (options.json) {
    printJson(events);
  } else {
    for (const event of events) {
      console.log(formatEvent(event));
    }
  }
  return EXIT_OK;
}
