import fs from 'node:fs';
import path from 'node:path';
import { PhaseOutcome, RunMetrics, ValidationStatus } from '../types/schemas.js';

export type ApprovalReadiness = 'ready' | 'attention';

export interface ApprovalSummary {
  phase: string;
  worker_count: number;
  artifact_count: number;
  validation_status: ValidationStatus;
}

export interface ApprovalWorkerLine {
  worker: string;
  success: boolean;
  duration_ms: number;
  artifact_count: number;
  retry_count: number;
}

export interface ApprovalPackage {
  run_id: string;
  phase: string;
  status: ApprovalReadiness;
  created_at: string;
  summary: ApprovalSummary;
  workers: ApprovalWorkerLine[];
  found: string[];
  missing: string[];
  metrics_paths: { json: string; prom: string };
  checklist: string[];
  commands: { approve: string; reject: string };
  markdown: string;
}

export interface ApprovalPackageOptions {
  runId: string;
  /** Paths shown to the reviewer; nothing is read from them */
  metricsPaths: { json: string; prom: string };
  /** Timestamp stamped on the package; callers pass the outcome's completed_at to keep it deterministic */
  createdAt?: string;
  cliName?: string;
}

export const REVIEWER_CHECKLIST = [
  'Artifacts cover what the phase set out to produce',
  'Worker notes contain no unresolved errors',
  'Missing patterns (if any) are understood and acceptable',
  'Output is safe for the next phase to build on'
];

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

function patternList(patterns: string[]): string[] {
  if (patterns.length === 0) return ['_None._'];
  return patterns.map((p) => `- \`${p}\``);
}

function countArtifacts(outcome: PhaseOutcome): number {
  return new Set([...outcome.validation.files, ...outcome.worker_outcomes.flatMap((w) => w.artifacts)]).size;
}

function renderMarkdown(pkg: Omit<ApprovalPackage, 'markdown'>, metrics: RunMetrics): string {
  const lines: string[] = [
    `# Approval Request: ${pkg.phase}`,
    '',
    `**Run:** ${pkg.run_id}`,
    `**Status:** ${pkg.status === 'ready' ? 'READY FOR REVIEW' : 'NEEDS ATTENTION'}`,
    `**Created:** ${pkg.created_at}`,
    '',
    '## Summary',
    '',
    '| Phase | Workers | Artifacts | Validation |',
    '|---|---|---|---|',
    `| ${pkg.summary.phase} | ${pkg.summary.worker_count} | ${pkg.summary.artifact_count} | ${pkg.summary.validation_status} |`,
    '',
    '## Workers',
    ''
  ];

  if (pkg.workers.length === 0) {
    lines.push('_No workers assigned._');
  }
  for (const w of pkg.workers) {
    lines.push(
      `- ${w.worker}: ${w.success ? 'ok' : 'failed'}, ${formatSeconds(w.duration_ms)}, ` +
      `${w.artifact_count} artifact(s), ${w.retry_count} retr${w.retry_count === 1 ? 'y' : 'ies'}`
    );
  }

  lines.push('', '## Validation', '', '### Found Patterns', '', ...patternList(pkg.found));
  lines.push('', '### Missing Patterns', '', ...patternList(pkg.missing));

  const hygiene = metrics.hygiene_score === null ? 'n/a' : metrics.hygiene_score.toFixed(1);
  lines.push(
    '',
    '## Metrics',
    '',
    `- Hygiene score: ${hygiene}`,
    `- Total retries: ${metrics.total_retries}`,
    `- Structured: \`${pkg.metrics_paths.json}\``,
    `- Exposition: \`${pkg.metrics_paths.prom}\``,
    '',
    '## Reviewer Checklist',
    '',
    ...pkg.checklist.map((item) => `- [ ] ${item}`),
    '',
    '## Decision',
    '',
    '```',
    pkg.commands.approve,
    pkg.commands.reject,
    '```'
  );

  return `${lines.join('\n')}\n`;
}

/**
 * Render the approval request for a phase that is waiting on a decision.
 * Pure: the same outcome, metrics and options always give the same package.
 */
export function buildApprovalPackage(
  outcome: PhaseOutcome,
  metrics: RunMetrics,
  options: ApprovalPackageOptions
): ApprovalPackage {
  const cli = options.cliName ?? 'phaserun';
  const base: Omit<ApprovalPackage, 'markdown'> = {
    run_id: options.runId,
    phase: outcome.phase,
    status: outcome.success && outcome.validation.status === 'pass' ? 'ready' : 'attention',
    created_at: options.createdAt ?? outcome.completed_at,
    summary: {
      phase: outcome.phase,
      worker_count: outcome.worker_outcomes.length,
      artifact_count: countArtifacts(outcome),
      validation_status: outcome.validation.status
    },
    workers: outcome.worker_outcomes.map((w) => ({
      worker: w.worker,
      success: w.success,
      duration_ms: w.duration_ms,
      artifact_count: w.artifacts.length,
      retry_count: w.retry_count
    })),
    found: [...outcome.validation.found],
    missing: [...outcome.validation.missing],
    metrics_paths: { ...options.metricsPaths },
    checklist: [...REVIEWER_CHECKLIST],
    commands: {
      approve: `${cli} approve ${options.runId}`,
      reject: `${cli} reject ${options.runId} --reason "<why>"`
    }
  };
  return { ...base, markdown: renderMarkdown(base, metrics) };
}

export function writeApprovalPackage(pkg: ApprovalPackage, filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, pkg.markdown);
}

export interface DecisionRecord {
  run_id: string;
  phase: string;
  approved: boolean;
  reason?: string;
  decided_at: string;
  validation_status?: ValidationStatus;
}

export function renderDecision(record: DecisionRecord): string {
  const lines: string[] = [
    `# Consensus Decision: ${record.phase}`,
    '',
    `**Run:** ${record.run_id}`,
    `**Decision:** ${record.approved ? 'APPROVED' : 'REJECTED'}`,
    `**Decided:** ${record.decided_at}`
  ];
  if (record.validation_status) {
    lines.push(`**Validation:** ${record.validation_status}`);
  }
  if (record.reason) {
    lines.push('', '## Reason', '', record.reason);
  }
  return `${lines.join('\n')}\n`;
}

/** `DECISION-20250101T120000123Z.md` for an ISO timestamp; sorts chronologically */
export function decisionFileName(decidedAt: string): string {
  return `DECISION-${decidedAt.replace(/[-:.]/g, '')}.md`;
}
