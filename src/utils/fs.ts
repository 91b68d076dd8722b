import { randomBytes } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Write a file in one step: the content goes to a temporary sibling which is
 * then renamed over the target, so readers never see a truncated file.
 * Parent directories are created. Returns the number of bytes written.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<number> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }

  return Buffer.byteLength(content, 'utf-8');
}
