import { promises as fs, constants as fsConstants } from 'fs';
import { dirname } from 'path';
import { parse as parseJsonc, ParseError, printParseErrorCode } from 'jsonc-parser';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file, replacing any previous content
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    if (error instanceof FileSystemError) {
      throw error;
    }
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Copy a file from source to destination
 */
export async function copyFile(src: string, dest: string): Promise<void> {
  try {
    await ensureDir(dirname(dest));
    await fs.copyFile(src, dest);
    logger.debug(`Copied file: ${src} -> ${dest}`);
  } catch (error) {
    if (error instanceof FileSystemError) {
      throw error;
    }
    throw new FileSystemError(`Failed to copy file: ${src} -> ${dest}`, { src, dest, error });
  }
}

/**
 * Remove a file or directory recursively. Missing paths are ignored.
 */
export async function remove(path: string): Promise<void> {
  try {
    await fs.rm(path, { recursive: true, force: true });
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to remove: ${path}`, { path, error });
  }
}

/**
 * List the entry names of a directory, skipping OS junk such as .DS_Store
 */
export async function listEntries(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath);
    return entries.filter(name => !isJunk(name)).sort();
  } catch (error) {
    throw new FileSystemError(`Failed to list directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * Write object to JSON file, newline-terminated
 */
export async function writeJsonFile(path: string, data: unknown, indent: number = 2): Promise<void> {
  await writeTextFile(path, JSON.stringify(data, null, indent) + '\n');
}

/**
 * Read a JSON or JSONC file (auto-detect format) and parse it
 * Works with both standard JSON and JSONC (JSON with comments)
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0 || result === undefined) {
    const reasons = errors.map(e => `${printParseErrorCode(e.error)} at offset ${e.offset}`);
    throw new FileSystemError(`Failed to parse JSON/JSONC file: ${path}`, { path, reasons });
  }
  return result;
}
