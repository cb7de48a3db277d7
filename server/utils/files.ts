import fs from 'node:fs/promises';
import path from 'node:path';

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Write through a temporary sibling and rename, so readers never see a half-written file.
 */
export async function writeFileAtomic(filePath: string, contents: string, mode?: number): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, contents, { mode });
  await fs.rename(tempPath, filePath);
}
