import fs from 'node:fs';
import path from 'node:path';

const RUN_ID_PATTERN = /^\d{14}$/;

/**
 * Run ids are UTC timestamps (YYYYMMDDHHmmss), so they sort chronologically.
 */
export function makeRunId(now = new Date()): string {
  const parts = [
    now.getUTCFullYear(),
    String(now.getUTCMonth() + 1).padStart(2, '0'),
    String(now.getUTCDate()).padStart(2, '0'),
    String(now.getUTCHours()).padStart(2, '0'),
    String(now.getUTCMinutes()).padStart(2, '0'),
    String(now.getUTCSeconds()).padStart(2, '0')
  ];
  return parts.join('');
}

/**
 * An explicit run id must look like a generated one, or `latest` and
 * `status --all` would never list it.
 */
export function assertRunId(runId: string): void {
  if (!RUN_ID_PATTERN.test(runId)) {
    throw new Error(`Invalid run id "${runId}": expected 14 digits (UTC YYYYMMDDHHmmss)`);
  }
}

/**
 * A fresh run id for `now`. When that second is taken the next free one is
 * used, so two starts within a second still get distinct, ordered ids.
 */
export function allocateRunId(runsDir: string, now = new Date()): string {
  let at = now.getTime();
  let runId = makeRunId(new Date(at));
  while (fs.existsSync(path.join(runsDir, runId))) {
    at += 1000;
    runId = makeRunId(new Date(at));
  }
  return runId;
}

/**
 * List run IDs, most recent first.
 * @param runsDir - The runs directory
 * @param limit - Maximum number of runs to return
 */
export function listRecentRunIds(runsDir: string, limit = 10): string[] {
  if (!fs.existsSync(runsDir)) {
    return [];
  }
  return fs
    .readdirSync(runsDir, { withFileTypes: true })
    .filter((e) => e.isDirectory() && RUN_ID_PATTERN.test(e.name))
    .map((e) => e.name)
    .sort()
    .reverse()
    .slice(0, limit);
}

export function findLatestRunId(runsDir: string): string | null {
  return listRecentRunIds(runsDir, 1)[0] ?? null;
}

/**
 * Resolve a run ID, supporting 'latest' as a special value.
 * @throws Error if 'latest' is given and no runs exist, or the run directory is missing
 */
export function resolveRunId(runId: string, runsDir: string): string {
  let resolvedId = runId;

  if (runId === 'latest') {
    const latest = findLatestRunId(runsDir);
    if (!latest) {
      throw new Error('No runs found. Start one first with `phaserun start`.');
    }
    resolvedId = latest;
  }

  if (!fs.existsSync(path.join(runsDir, resolvedId))) {
    const knownRuns = listRecentRunIds(runsDir, 5);
    const hint = knownRuns.length > 0 ? `Known runs: ${knownRuns.join(', ')}` : 'No runs found.';
    throw new Error(`Run not found: ${resolvedId}. ${hint}`);
  }

  return resolvedId;
}
