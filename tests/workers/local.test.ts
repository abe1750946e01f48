import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DispatchingExecutor } from '../../src/workers/executor.js';
import { LocalWorkerSpec } from '../../src/workers/local.js';
import { WorkerContext } from '../../src/workers/types.js';
import { RetryPolicy } from '../../src/config/schema.js';
import { silentLogger } from '../../src/output/logger.js';

const policy: RetryPolicy = {
  max_retries: 2,
  base_delay_ms: 1,
  backoff_multiplier: 2,
  jitter: 0,
  transient_exit_codes: [75, 101, 111, 125],
  transient_messages: ['rate limit', 'transient network', 'timeout']
};

function shWorker(script: string, extra: Partial<LocalWorkerSpec> = {}): LocalWorkerSpec {
  return { id: 'w', kind: 'local', bin: 'sh', args: ['-c', script], env: {}, ...extra };
}

describe('local worker strategy', () => {
  let root: string;
  let context: WorkerContext;
  let executor: DispatchingExecutor;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'local-worker-test-'));
    context = {
      run_id: 'run-1',
      root_dir: root,
      run_dir: path.join(root, '.phaserun', 'runs', 'run-1'),
      phase_artifacts: { plan: ['docs/plan.md'] },
      metadata: {}
    };
    executor = new DispatchingExecutor({
      retry: policy,
      timeoutMs: 10_000,
      sleep: async () => undefined,
      logger: silentLogger
    });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('captures stdout and declared artifacts on success', async () => {
    const outcome = await executor.run(shWorker('echo "ARTIFACT: out.txt"; echo done'), 'build', context);

    expect(outcome.success).toBe(true);
    expect(outcome.worker).toBe('w');
    expect(outcome.artifacts).toEqual(['out.txt']);
    expect(outcome.notes).toBe('ARTIFACT: out.txt\ndone');
    expect(outcome.exit_code).toBe(0);
    expect(outcome.retry_count).toBe(0);
    expect(outcome.errors).toEqual([]);
    expect(outcome.error_kind).toBeNull();
  });

  it('runs in the project root by default', async () => {
    await executor.run(shWorker('printf hello > here.txt'), 'build', context);

    expect(fs.readFileSync(path.join(root, 'here.txt'), 'utf-8')).toBe('hello');
  });

  it('exposes run details as environment variables', async () => {
    const outcome = await executor.run(
      shWorker('printf "%s|%s|%s" "$PHASERUN_RUN_ID" "$PHASERUN_PHASE" "$PHASERUN_WORKER"'),
      'build',
      context
    );
    expect(outcome.notes).toBe('run-1|build|w');

    const artifacts = await executor.run(shWorker('printf "%s" "$PHASERUN_ARTIFACTS"'), 'build', context);
    expect(JSON.parse(artifacts.notes)).toEqual({ plan: ['docs/plan.md'] });
  });

  it('writes the request to stdin', async () => {
    const outcome = await executor.run(shWorker('cat', { request: 'hello worker' }), 'build', context);
    expect(outcome.notes).toBe('hello worker');
  });

  it('retries transient exit codes until the worker succeeds', async () => {
    const script = [
      'n=$(cat count 2>/dev/null || echo 0)',
      'n=$((n+1))',
      'echo $n > count',
      'if [ "$n" -lt 3 ]; then exit 75; fi',
      'echo "ARTIFACT: result.txt"'
    ].join('\n');

    const outcome = await executor.run(shWorker(script), 'build', context);

    expect(outcome.success).toBe(true);
    expect(outcome.retry_count).toBe(2);
    expect(outcome.artifacts).toEqual(['result.txt']);
    expect(fs.readFileSync(path.join(root, 'count'), 'utf-8').trim()).toBe('3');
  });

  it('gives up after max_retries transient failures', async () => {
    const outcome = await executor.run(shWorker('exit 75'), 'build', context);

    expect(outcome.success).toBe(false);
    expect(outcome.exit_code).toBe(75);
    expect(outcome.retry_count).toBe(2);
    expect(outcome.error_kind).toBe('transient_exit');
  });

  it('does not retry a plain failure', async () => {
    const outcome = await executor.run(shWorker('echo oops >&2; exit 3'), 'build', context);

    expect(outcome.success).toBe(false);
    expect(outcome.exit_code).toBe(3);
    expect(outcome.retry_count).toBe(0);
    expect(outcome.error_kind).toBe('worker_failed');
    expect(outcome.errors).toEqual(['w exited with code 3']);
    expect(outcome.notes).toBe('oops');
  });

  it('reports a binary that cannot be started', async () => {
    const outcome = await executor.run(
      { id: 'w', kind: 'local', bin: 'phaserun-no-such-binary', args: [], env: {} },
      'build',
      context
    );

    expect(outcome.success).toBe(false);
    expect(outcome.exit_code).toBeNull();
    expect(outcome.error_kind).toBe('spawn_failed');
    expect(outcome.retry_count).toBe(0);
  });

  it('reports a worker killed by a signal', async () => {
    const outcome = await executor.run(shWorker('kill -TERM $$'), 'build', context);

    expect(outcome.success).toBe(false);
    expect(outcome.error_kind).toBe('worker_failed');
    expect(outcome.errors).toEqual(['w was terminated by SIGTERM']);
    expect(outcome.retry_count).toBe(0);
  });

  it('kills a worker that overruns its timeout and retries it', async () => {
    const quick = new DispatchingExecutor({
      retry: { ...policy, max_retries: 1 },
      timeoutMs: 10_000,
      sleep: async () => undefined,
      logger: silentLogger
    });

    const started = Date.now();
    const outcome = await quick.run(shWorker('exec sleep 5', { timeout_ms: 100 }), 'build', context);

    expect(outcome.success).toBe(false);
    expect(outcome.error_kind).toBe('timeout');
    expect(outcome.exit_code).toBeNull();
    expect(outcome.retry_count).toBe(1);
    expect(outcome.errors).toEqual(['Worker w timed out after 100ms']);
    expect(Date.now() - started).toBeLessThan(4000);
  });

  it('calls onRetry for each retried attempt', async () => {
    const retried: number[] = [];
    const observed = new DispatchingExecutor({
      retry: policy,
      timeoutMs: 10_000,
      sleep: async () => undefined,
      logger: silentLogger,
      onRetry: (worker, phase, info) => {
        expect(worker).toBe('w');
        expect(phase).toBe('build');
        retried.push(info.attempt);
      }
    });

    await observed.run(shWorker('exit 111'), 'build', context);
    expect(retried).toEqual([1, 2]);
  });
});
