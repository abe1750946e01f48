import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadConfig, parseConfig, resolveConfigPath } from '../../src/config/load.js';
import { DEFAULT_WORKER_TIMEOUT_MS, enabledPhases, MAX_TIMER_MS, resolveWorker } from '../../src/config/schema.js';
import { ConfigError } from '../../src/types/errors.js';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

const CONFIG_PATH = 'phaserun.config.yaml';

describe('parseConfig', () => {
  const savedTimeout = process.env.PHASERUN_WORKER_TIMEOUT_MS;

  afterEach(() => {
    if (savedTimeout === undefined) {
      delete process.env.PHASERUN_WORKER_TIMEOUT_MS;
    } else {
      process.env.PHASERUN_WORKER_TIMEOUT_MS = savedTimeout;
    }
  });

  it('fills in defaults', () => {
    delete process.env.PHASERUN_WORKER_TIMEOUT_MS;
    const config = parseConfig('phases:\n  - name: plan\n', CONFIG_PATH);

    expect(config.phases).toEqual([
      {
        name: 'plan',
        enabled: true,
        workers: [],
        parallel: false,
        max_concurrency: 1,
        stop_on_failure: true,
        requires_approval: false,
        artifacts: []
      }
    ]);
    expect(config.workers).toEqual({});
    expect(config.retry).toEqual({
      max_retries: 2,
      base_delay_ms: 700,
      backoff_multiplier: 2,
      jitter: 0.25,
      transient_exit_codes: [75, 101, 111, 125],
      transient_messages: ['rate limit', 'transient network', 'timeout']
    });
    expect(config.timeouts.worker_ms).toBe(DEFAULT_WORKER_TIMEOUT_MS);
  });

  it('parses both worker kinds', () => {
    const config = parseConfig(
      [
        'phases:',
        '  - name: build',
        '    workers: [builder, critic]',
        '    artifacts: ["dist/*.js"]',
        'workers:',
        '  builder:',
        '    kind: local',
        '    bin: make',
        '    args: [all]',
        '  critic:',
        '    kind: remote',
        '    endpoint: http://127.0.0.1:9000/review',
        '    api_key_env: CRITIC_TOKEN',
        ''
      ].join('\n'),
      CONFIG_PATH
    );

    expect(resolveWorker(config, 'builder')).toEqual({ id: 'builder', kind: 'local', bin: 'make', args: ['all'], env: {} });
    expect(resolveWorker(config, 'critic')).toEqual({
      id: 'critic',
      kind: 'remote',
      endpoint: 'http://127.0.0.1:9000/review',
      method: 'POST',
      headers: {},
      api_key_env: 'CRITIC_TOKEN',
      request: ''
    });
    expect(() => resolveWorker(config, 'nobody')).toThrow('Unknown worker: nobody');
  });

  it('parses JSON by extension', () => {
    const config = parseConfig('{"phases":[{"name":"a","enabled":false},{"name":"b"}]}', 'phaserun.config.json');
    expect(enabledPhases(config).map((p) => p.name)).toEqual(['b']);
  });

  it('rejects duplicate phase names', () => {
    expect(issuesOf(() => parseConfig('phases:\n  - name: plan\n  - name: plan\n', CONFIG_PATH))).toEqual([
      'phases.1.name: Duplicate phase name: plan'
    ]);
  });

  it('rejects references to unknown workers', () => {
    expect(issuesOf(() => parseConfig('phases:\n  - name: plan\n    workers: [ghost]\n', CONFIG_PATH))).toEqual([
      'phases.0.workers.0: Phase "plan" references unknown worker "ghost"'
    ]);
  });

  it('rejects names that cannot be directory names', () => {
    expect(issuesOf(() => parseConfig('phases:\n  - name: ../escape\n', CONFIG_PATH))).toEqual([
      'phases.0.name: must be letters, digits, dot, dash or underscore'
    ]);
    expect(
      issuesOf(() =>
        parseConfig('phases:\n  - name: plan\nworkers:\n  "bad id":\n    kind: local\n    bin: make\n', CONFIG_PATH)
      )
    ).toEqual(['workers.bad id: Invalid worker id "bad id": must be letters, digits, dot, dash or underscore']);
  });

  it('rejects a remote worker without a valid endpoint', () => {
    const issues = issuesOf(() =>
      parseConfig('phases:\n  - name: plan\nworkers:\n  critic:\n    kind: remote\n    endpoint: nowhere\n', CONFIG_PATH)
    );
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('workers.critic.endpoint: ')).toBe(true);
  });

  it('requires at least one phase', () => {
    expect(issuesOf(() => parseConfig('phases: []\n', CONFIG_PATH))[0].startsWith('phases: ')).toBe(true);
  });

  it('reports unparseable YAML', () => {
    expect(() => parseConfig('phases: [unclosed\n', CONFIG_PATH)).toThrow(ConfigError);
  });

  it('takes the worker timeout from the environment', () => {
    process.env.PHASERUN_WORKER_TIMEOUT_MS = '5000';
    expect(parseConfig('phases:\n  - name: plan\n', CONFIG_PATH).timeouts.worker_ms).toBe(5000);
  });

  it('rejects timeouts setTimeout cannot honour', () => {
    delete process.env.PHASERUN_WORKER_TIMEOUT_MS;
    expect(issuesOf(() => parseConfig('phases:\n  - name: plan\ntimeouts:\n  worker_ms: 2200000000\n', CONFIG_PATH))).toEqual([
      `timeouts.worker_ms: Number must be less than or equal to ${MAX_TIMER_MS}`
    ]);

    const worker = [
      'phases:',
      '  - name: plan',
      '    workers: [w]',
      'workers:',
      '  w:',
      '    kind: local',
      '    bin: make',
      '    timeout_ms: 3000000000',
      ''
    ].join('\n');
    expect(issuesOf(() => parseConfig(worker, CONFIG_PATH))).toContain(
      `workers.w.timeout_ms: Number must be less than or equal to ${MAX_TIMER_MS}`
    );

    const atLimit = parseConfig(`phases:\n  - name: plan\ntimeouts:\n  worker_ms: ${MAX_TIMER_MS}\n`, CONFIG_PATH);
    expect(atLimit.timeouts.worker_ms).toBe(2_147_483_647);
  });

  it('rejects a timeout override setTimeout cannot honour', () => {
    process.env.PHASERUN_WORKER_TIMEOUT_MS = '2200000000';
    expect(issuesOf(() => parseConfig('phases:\n  - name: plan\n', CONFIG_PATH))).toEqual([
      'PHASERUN_WORKER_TIMEOUT_MS: must be at most 2147483647'
    ]);
  });

  it('ignores a non-numeric timeout override', () => {
    process.env.PHASERUN_WORKER_TIMEOUT_MS = 'soon';
    expect(parseConfig('phases:\n  - name: plan\ntimeouts:\n  worker_ms: 42\n', CONFIG_PATH).timeouts.worker_ms).toBe(42);
  });
});

describe('config files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-load-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('finds a .yml config in the project root', () => {
    fs.writeFileSync(path.join(dir, 'phaserun.config.yml'), 'phases:\n  - name: plan\n');

    const configPath = resolveConfigPath(dir);

    expect(configPath).toBe(path.join(dir, 'phaserun.config.yml'));
    expect(loadConfig(configPath).phases[0].name).toBe('plan');
  });

  it('falls back to the .yaml name when nothing exists', () => {
    expect(resolveConfigPath(dir)).toBe(path.join(dir, 'phaserun.config.yaml'));
  });

  it('uses an explicit path as given', () => {
    expect(resolveConfigPath(dir, path.join(dir, 'custom.yaml'))).toBe(path.join(dir, 'custom.yaml'));
  });

  it('reports a missing file', () => {
    const missing = path.join(dir, 'phaserun.config.yaml');
    expect(issuesOf(() => loadConfig(missing))).toEqual(['file not found']);
  });
});
