import { access, mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * Create a directory recursively if it does not exist yet
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await access(dirPath);
  } catch {
    await mkdir(dirPath, { recursive: true });
  }
}

/**
 * Write a file, creating its parent directory first
 */
export async function writeFileSafeAsync(filePath: string, content: string): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, 'utf-8');
}
