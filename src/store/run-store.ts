import fs from 'node:fs';
import path from 'node:path';
import { WorkflowConfig, workflowConfigSchema } from '../config/schema.js';
import { runMetricsSchema } from '../metrics/tracker.js';
import { Event, RunMetrics, RunState, runStateSchema } from '../types/schemas.js';
import { atomicWriteFile, atomicWriteJson } from './atomic-write.js';
import { acquireRunLock, releaseRunLock } from './lock.js';

/**
 * What the engine needs from durable storage to load and commit a run.
 * One store per run id; runs never share a store.
 */
export interface StateStore {
  readonly runId: string;
  readonly path: string;
  hasState(): boolean;
  readState(): RunState;
  writeState(state: RunState): void;
  writeConfigSnapshot(config: WorkflowConfig): void;
  metricsPaths(): { json: string; prom: string };
  writeMetrics(metrics: RunMetrics, exposition: string): void;
  readMetrics(): RunMetrics | null;
  writeValidationReport(phase: string, content: string): string;
  consensusDir(phase: string): string;
  writeDecision(phase: string, fileName: string, content: string): string;
  writeAdvisory(fileName: string, content: string): string;
  appendEvent(event: Omit<Event, 'seq' | 'timestamp'>): Event;
  acquireLock(operation: string): void;
  releaseLock(): void;
}

export class RunStore implements StateStore {
  readonly runId: string;
  private runDir: string;
  private timelinePath: string;
  private seqPath: string;

  private constructor(runId: string, runDir: string) {
    this.runId = runId;
    this.runDir = runDir;
    this.timelinePath = path.join(runDir, 'timeline.jsonl');
    this.seqPath = path.join(runDir, 'seq.txt');
  }

  /** Open a run directory, creating it if needed. */
  static init(runId: string, runsDir: string): RunStore {
    const runDir = path.join(runsDir, runId);
    fs.mkdirSync(runDir, { recursive: true });
    if (!fs.existsSync(path.join(runDir, 'timeline.jsonl'))) {
      fs.writeFileSync(path.join(runDir, 'timeline.jsonl'), '');
    }
    return new RunStore(runId, runDir);
  }

  /** Open a run directory without touching the filesystem (used for read-only status). */
  static open(runId: string, runsDir: string): RunStore {
    return new RunStore(runId, path.join(runsDir, runId));
  }

  get path(): string {
    return this.runDir;
  }

  get statePath(): string {
    return path.join(this.runDir, 'state.json');
  }

  get lockPath(): string {
    return path.join(this.runDir, 'run.lock');
  }

  metricsPaths(): { json: string; prom: string } {
    return {
      json: path.join(this.runDir, 'metrics.json'),
      prom: path.join(this.runDir, 'metrics.prom')
    };
  }

  hasState(): boolean {
    return fs.existsSync(this.statePath);
  }

  writeState(state: RunState): void {
    atomicWriteJson(this.statePath, state);
  }

  readState(): RunState {
    const raw = fs.readFileSync(this.statePath, 'utf-8');
    const parsed = runStateSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new Error(`Corrupt state file ${this.statePath}: ${issues.join('; ')}`);
    }
    return parsed.data;
  }

  writeConfigSnapshot(config: WorkflowConfig): void {
    atomicWriteJson(path.join(this.runDir, 'config.snapshot.json'), config);
  }

  readConfigSnapshot(): WorkflowConfig {
    const target = path.join(this.runDir, 'config.snapshot.json');
    return workflowConfigSchema.parse(JSON.parse(fs.readFileSync(target, 'utf-8')));
  }

  writeMetrics(metrics: RunMetrics, exposition: string): void {
    const paths = this.metricsPaths();
    atomicWriteJson(paths.json, metrics);
    atomicWriteFile(paths.prom, exposition);
  }

  readMetrics(): RunMetrics | null {
    const target = this.metricsPaths().json;
    if (!fs.existsSync(target)) {
      return null;
    }
    return runMetricsSchema.parse(JSON.parse(fs.readFileSync(target, 'utf-8')));
  }

  writeValidationReport(phase: string, content: string): string {
    const target = path.join(this.runDir, 'validation', `${phase}.md`);
    atomicWriteFile(target, content);
    return target;
  }

  consensusDir(phase: string): string {
    return path.join(this.runDir, 'consensus', phase);
  }

  writeDecision(phase: string, fileName: string, content: string): string {
    const target = path.join(this.consensusDir(phase), fileName);
    atomicWriteFile(target, content);
    return target;
  }

  /** Notes written at the top of the run directory, such as rollback advisories. */
  writeAdvisory(fileName: string, content: string): string {
    const target = path.join(this.runDir, fileName);
    atomicWriteFile(target, content);
    return target;
  }

  appendEvent(event: Omit<Event, 'seq' | 'timestamp'>): Event {
    fs.mkdirSync(this.runDir, { recursive: true });
    const seq = this.nextSeq();
    const full: Event = {
      ...event,
      seq,
      timestamp: new Date().toISOString()
    };
    fs.appendFileSync(this.timelinePath, `${JSON.stringify(full)}\n`);
    return full;
  }

  readTimeline(): Event[] {
    if (!fs.existsSync(this.timelinePath)) {
      return [];
    }
    const events: Event[] = [];
    for (const line of fs.readFileSync(this.timelinePath, 'utf-8').split('\n')) {
      if (!line.trim()) continue;
      const parsed: unknown = JSON.parse(line);
      if (isEvent(parsed)) events.push(parsed);
    }
    return events;
  }

  acquireLock(operation: string): void {
    acquireRunLock(this.lockPath, this.runId, operation);
  }

  releaseLock(): void {
    releaseRunLock(this.lockPath);
  }

  private nextSeq(): number {
    let current = 0;
    if (fs.existsSync(this.seqPath)) {
      const raw = fs.readFileSync(this.seqPath, 'utf-8').trim();
      if (raw) {
        current = Number.parseInt(raw, 10) || 0;
      }
    }
    const next = current + 1;
    fs.writeFileSync(this.seqPath, String(next));
    return next;
  }
}

function isEvent(value: unknown): value is Event {
  if (!value || typeof value !== 'object') return false;
  return (
    typeof Reflect.get(value, 'seq') === 'number' &&
    typeof Reflect.get(value, 'type') === 'string' &&
    typeof Reflect.get(value, 'timestamp') === 'string'
  );
}
