import fs from 'fs/promises';

export function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Create a directory (and parents) if it does not exist yet
 */
export async function ensureDirectory(directory: string): Promise<string> {
  await fs.mkdir(directory, { recursive: true });
  return directory;
}

/**
 * Write a value as 2-space indented JSON, replacing the whole file.
 * Non-ASCII text is written as-is (UTF-8), not escaped.
 */
export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await fs.writeFile(filePath, JSON.stringify(value, null, 2), 'utf-8');
}
