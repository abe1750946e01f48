import { RetryPolicy } from '../config/schema.js';
import { ErrorKind } from '../types/schemas.js';
import { TimeoutExceededError, WorkerCallError } from '../types/errors.js';

const TRANSIENT_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'timeout',
  'transient_exit',
  'rate_limit',
  'network',
  'server_error'
]);

export function isTransientKind(kind: ErrorKind): boolean {
  return TRANSIENT_KINDS.has(kind);
}

/**
 * Kind for a process exit code: transient when the policy lists it, plain failure otherwise.
 */
export function classifyExitCode(exitCode: number, policy: Pick<RetryPolicy, 'transient_exit_codes'>): ErrorKind {
  return policy.transient_exit_codes.includes(exitCode) ? 'transient_exit' : 'worker_failed';
}

export function classifyHttpStatus(status: number): ErrorKind {
  if (status === 429) return 'rate_limit';
  if (status >= 500) return 'server_error';
  return 'http_error';
}

export function matchesTransientMessage(message: string, policy: Pick<RetryPolicy, 'transient_messages'>): boolean {
  const lower = message.toLowerCase();
  return policy.transient_messages.some((fragment) => fragment && lower.includes(fragment.toLowerCase()));
}

/**
 * Retry eligibility for a failed attempt.
 *
 * Structured kinds decide first; the exit-code list and the legacy
 * substring list are consulted for everything else.
 */
export function isRetryableError(
  error: unknown,
  policy: Pick<RetryPolicy, 'transient_exit_codes' | 'transient_messages'>
): boolean {
  if (error instanceof TimeoutExceededError) {
    return true;
  }
  if (error instanceof WorkerCallError) {
    if (isTransientKind(error.kind)) return true;
    if (error.exitCode !== null && policy.transient_exit_codes.includes(error.exitCode)) return true;
    return matchesTransientMessage(`${error.message}\n${error.output}`, policy);
  }
  if (error instanceof Error) {
    return matchesTransientMessage(error.message, policy);
  }
  return matchesTransientMessage(String(error), policy);
}
