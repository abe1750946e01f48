import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';

/**
 * Write a file via a sibling temp file and rename, so readers see either the
 * old content or the new content and never a partial write.
 */
export function atomicWriteFile(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString('hex')}`;

  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(tmp, content);
    fs.renameSync(tmp, filePath);
  } catch (error) {
    fs.rmSync(tmp, { force: true });
    throw error;
  }
}

export function atomicWriteJson(filePath: string, data: unknown): void {
  atomicWriteFile(filePath, `${JSON.stringify(data, null, 2)}\n`);
}
