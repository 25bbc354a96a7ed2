import { join, dirname, isAbsolute } from 'path';
import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';

/** Write a file and creates the necessary directory structure. */
export async function safeWriteFile(
  filePath: string,
  content: string,
  encoding: BufferEncoding = 'utf8'
): Promise<void> {
  const directory = dirname(filePath);

  if (!existsSync(directory)) {
    await mkdir(directory, { recursive: true });
  }

  await writeFile(filePath, content, encoding);
}

/**
 * Reads a UTF-8 file, resolving to `null` if it doesn't exist.
 * Any other read failure is re-thrown.
 */
export async function readFileIfExists(
  filePath: string
): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Given a path that may be relative or absolute, returns either the absolute path itself
 * or resolves the relative path relative to the script's current working directory. This is
 * useful for CLI arguments where the users might pass either a relative or absolute path.
 * @param path Path to process.
 */
export function toProcessAbsolutePath(path: string): string {
  return isAbsolute(path) ? path : join(process.cwd(), path);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
