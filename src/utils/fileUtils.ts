import * as fs from 'node:fs';
import * as fsp from 'node:fs/promises';
import * as path from 'node:path';

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsp.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Size of a regular file in bytes, or `null` when it is missing or is not
 * a regular file.
 */
export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await fsp.stat(filePath);
    return stats.isFile() ? stats.size : null;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * True when the file exists, is non-empty and its first byte can be read.
 */
export async function isReadableNonEmpty(filePath: string): Promise<boolean> {
  let handle: fsp.FileHandle | undefined;
  try {
    handle = await fsp.open(filePath, 'r');
    const { bytesRead } = await handle.read(Buffer.alloc(1), 0, 1, 0);
    return bytesRead > 0;
  } catch {
    return false;
  } finally {
    await handle?.close();
  }
}

export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  try {
    await fsp.mkdir(dirPath, { recursive: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'EEXIST') {
      throw error;
    }
  }
}

export async function readFile(filePath: string): Promise<string> {
  return fsp.readFile(filePath, 'utf-8');
}

export async function writeFile(
  filePath: string,
  content: string
): Promise<void> {
  await ensureDirectoryExists(path.dirname(filePath));
  await fsp.writeFile(filePath, content, 'utf-8');
}

/**
 * Copies `source` to `target` through a sibling temporary file and a
 * rename, so readers of `target` never observe a partial copy.
 */
export async function copyFileAtomic(
  source: string,
  target: string
): Promise<void> {
  await ensureDirectoryExists(path.dirname(target));
  const tempPath = `${target}.${process.pid}.${Date.now()}.${Math.random()
    .toString(36)
    .slice(2, 8)}.tmp`;
  try {
    await fsp.copyFile(source, tempPath);
    await fsp.rename(tempPath, target);
  } catch (error) {
    await fsp.rm(tempPath, { force: true });
    throw error;
  }
}

export async function listFiles(
  directory: string,
  extension?: string
): Promise<string[]> {
  try {
    const files = await fsp.readdir(directory);
    if (extension) {
      return files.filter((file) => file.endsWith(extension));
    }
    return files;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return []; // Directory doesn't exist, return empty list
    }
    throw error;
  }
}

export async function removeFile(filePath: string): Promise<void> {
  await fsp.rm(filePath, { force: true });
}

export async function removeDirectory(dirPath: string): Promise<void> {
  await fsp.rm(dirPath, { recursive: true, force: true });
}
