export interface RollbackAdvisory {
  run_id: string;
  from_phase: string | null;
  to_phase: string;
  rolled_back_at: string;
  /** Completed phases before the rollback, in order */
  completed_before: string[];
  /** Completed phases that no longer count as done */
  reopened: string[];
}

/**
 * Markdown note written beside the run state on rollback. The rollback only
 * moves the cursor; whatever those phases wrote is still on disk.
 */
export function renderRollbackAdvisory(advisory: RollbackAdvisory): string {
  const lines: string[] = [
    `# Rollback: ${advisory.from_phase ?? '(completed)'} → ${advisory.to_phase}`,
    '',
    `**Run:** ${advisory.run_id}`,
    `**From phase:** ${advisory.from_phase ?? '-'}`,
    `**To phase:** ${advisory.to_phase}`,
    `**Rolled back:** ${advisory.rolled_back_at}`,
    '',
    '## Completed Phases Before Rollback',
    ''
  ];
  if (advisory.completed_before.length === 0) {
    lines.push('_None_');
  } else {
    for (const phase of advisory.completed_before) {
      lines.push(`- ${phase}${advisory.reopened.includes(phase) ? ' (reopened)' : ''}`);
    }
  }

  lines.push(
    '',
    '## Manual Steps',
    '',
    `- [ ] Review artifacts written by ${advisory.to_phase} and the phases after it`,
    '- [ ] Revert or remove files that should not survive the rollback',
    `- [ ] Run \`phaserun advance ${advisory.run_id}\` to re-run ${advisory.to_phase}`,
    '',
    'Nothing was deleted: only the run state was rewound.'
  );
  return `${lines.join('\n')}\n`;
}

/** `ROLLBACK-20250101T120000123Z.md` for an ISO timestamp */
export function rollbackFileName(rolledBackAt: string): string {
  return `ROLLBACK-${rolledBackAt.replace(/[-:.]/g, '')}.md`;
}
