import fs from 'node:fs';
import path from 'node:path';
import picomatch from 'picomatch';
import { ValidationResult, ValidationStatus } from '../types/schemas.js';

/** Directories never searched for artifacts */
const ALWAYS_SKIPPED = ['.git', 'node_modules'];

const GLOB_CHARS = /[*?[\]{}()!]/;

export interface ValidateOptions {
  /** Extra directory names to leave out of the search (e.g. the state dir) */
  skipDirs?: string[];
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

function isNonEmptyFile(fullPath: string): boolean {
  try {
    const stat = fs.statSync(fullPath);
    return stat.isFile() && stat.size > 0;
  } catch {
    return false;
  }
}

/**
 * List every regular file under rootDir as a sorted POSIX path relative to it.
 * Symlinked directories are not followed.
 */
function listFiles(rootDir: string, skip: Set<string>): string[] {
  const files: string[] = [];
  const walk = (dir: string, rel: string): void => {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch {
      return;
    }
    for (const entry of entries) {
      const relPath = rel ? `${rel}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        if (skip.has(entry.name)) continue;
        walk(path.join(dir, entry.name), relPath);
      } else if (entry.isFile()) {
        files.push(relPath);
      }
    }
  };
  walk(rootDir, '');
  return files.sort();
}

/** Absolute patterns and ones climbing out with `..` never match. */
function escapesRoot(normalized: string): boolean {
  return path.posix.isAbsolute(normalized) || normalized === '..' || normalized.startsWith('../');
}

/** A literal path counts only where the walk would have found it. */
function insideSkippedDir(relPath: string, skip: Set<string>): boolean {
  return relPath.split('/').slice(0, -1).some((segment) => skip.has(segment));
}

export function deriveStatus(found: number, required: number): ValidationStatus {
  if (found === required) return 'pass';
  if (found === 0) return 'fail';
  return 'partial';
}

/**
 * Check a phase's artifact patterns against the filesystem.
 *
 * A pattern is satisfied by at least one regular, non-empty file inside
 * rootDir and outside the skipped directories. Patterns without glob
 * characters are checked with a single stat; the directory walk happens at
 * most once per call. The result only depends on directory
 * contents, so calling it twice on an unchanged tree gives equal results.
 */
export function validateArtifacts(
  patterns: string[],
  rootDir: string,
  options: ValidateOptions = {}
): ValidationResult {
  const root = path.resolve(rootDir);
  const skip = new Set([...ALWAYS_SKIPPED, ...(options.skipDirs ?? [])]);
  let allFiles: string[] | null = null;

  const found: string[] = [];
  const missing: string[] = [];
  const files = new Set<string>();

  for (const pattern of patterns) {
    const normalized = path.posix.normalize(toPosix(pattern)).replace(/^\.\//, '');
    let matches: string[];

    if (escapesRoot(normalized) || path.isAbsolute(pattern)) {
      matches = [];
    } else if (!GLOB_CHARS.test(normalized)) {
      const literal = !insideSkippedDir(normalized, skip) && isNonEmptyFile(path.join(root, normalized));
      matches = literal ? [normalized] : [];
    } else {
      if (allFiles === null) {
        allFiles = listFiles(root, skip);
      }
      const isMatch = picomatch(normalized, { dot: true });
      matches = allFiles.filter((file) => isMatch(file) && isNonEmptyFile(path.join(root, file)));
    }

    if (matches.length > 0) {
      found.push(pattern);
      matches.forEach((file) => files.add(file));
    } else {
      missing.push(pattern);
    }
  }

  return {
    status: deriveStatus(found.length, patterns.length),
    required: [...patterns],
    found,
    missing,
    files: [...files].sort()
  };
}

/**
 * Markdown report of one validation, written next to the run state.
 */
export function renderValidationReport(phase: string, result: ValidationResult, checkedAt: string): string {
  const lines: string[] = [
    `# Checkpoint Validation: ${phase}`,
    '',
    `**Status:** ${result.status.toUpperCase()}`,
    `**Checked:** ${checkedAt}`,
    '',
    '## Required Artifacts',
    ''
  ];

  if (result.required.length === 0) {
    lines.push('_No artifact patterns declared._');
  } else {
    for (const pattern of result.required) {
      lines.push(`- \`${pattern}\``);
    }
  }

  lines.push('', '## Validation Results', '', '### Found Artifacts', '');
  if (result.files.length === 0) {
    lines.push('_None._');
  } else {
    for (const file of result.files) {
      lines.push(`- \`${file}\``);
    }
  }

  if (result.missing.length > 0) {
    lines.push('', '### Missing Patterns', '');
    for (const pattern of result.missing) {
      lines.push(`- \`${pattern}\``);
    }
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Paths a completed phase is credited with: the validator's matches first,
 * then anything workers declared that the patterns did not cover.
 */
export function collectPhaseArtifacts(result: ValidationResult, declared: string[][]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const file of [...result.files, ...declared.flat()]) {
    if (!seen.has(file)) {
      seen.add(file);
      out.push(file);
    }
  }
  return out;
}
