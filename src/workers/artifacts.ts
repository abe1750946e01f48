/**
 * Parse artifact declarations from worker output.
 *
 * Recognised lines (leading/trailing whitespace ignored):
 *   ARTIFACT: path/to/file
 *   ARTIFACTS: a.md, b.md
 *
 * Order of first appearance is kept; duplicates and blank entries are dropped.
 */
export function parseArtifactDeclarations(output: string): string[] {
  const artifacts: string[] = [];
  const seen = new Set<string>();

  const add = (raw: string): void => {
    const value = raw.trim();
    if (!value || seen.has(value)) return;
    seen.add(value);
    artifacts.push(value);
  };

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.startsWith('ARTIFACTS:')) {
      line.slice('ARTIFACTS:'.length).split(',').forEach(add);
    } else if (line.startsWith('ARTIFACT:')) {
      add(line.slice('ARTIFACT:'.length));
    }
  }

  return artifacts;
}

const NOTES_LIMIT = 2000;

/** Keep the tail of long output; the end is where workers summarise. */
export function truncateNotes(text: string, limit = NOTES_LIMIT): string {
  const trimmed = text.trim();
  if (trimmed.length <= limit) return trimmed;
  return `…${trimmed.slice(trimmed.length - (limit - 1))}`;
}
