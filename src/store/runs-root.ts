import path from 'node:path';

export const DEFAULT_STATE_DIR = '.phaserun';

/**
 * Where run state lives for one project.
 *
 * Layout:
 * ```
 * .phaserun/
 *   runs/<runId>/
 *     state.json, timeline.jsonl, metrics.json, ...
 * ```
 */
export interface StatePaths {
  /** The project root; artifact patterns resolve against this */
  project_root: string;
  /** The state directory root */
  state_root: string;
  /** One subdirectory per run */
  runs_dir: string;
}

/**
 * Resolve state paths for a project.
 *
 * The state dir comes from the argument, then PHASERUN_STATE_DIR, then the
 * default. Relative values resolve against the project root.
 */
export function getStatePaths(projectRoot: string, stateDir?: string): StatePaths {
  const root = path.resolve(projectRoot);
  const dir = stateDir ?? process.env.PHASERUN_STATE_DIR ?? DEFAULT_STATE_DIR;
  const stateRoot = path.isAbsolute(dir) ? dir : path.resolve(root, dir);

  return {
    project_root: root,
    state_root: stateRoot,
    runs_dir: path.join(stateRoot, 'runs')
  };
}

/**
 * Directory name to leave out of artifact searches, when the state dir sits
 * directly inside the project root.
 */
export function stateDirSkipName(paths: StatePaths): string | null {
  const rel = path.relative(paths.project_root, paths.state_root);
  if (!rel || rel.startsWith('..') || path.isAbsolute(rel)) return null;
  return rel.split(path.sep)[0] ?? null;
}
