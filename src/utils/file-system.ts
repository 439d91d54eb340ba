/**
 * File system operations - reading, writing, and globbing.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write content to a file, creating parent directories.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Find files matching glob patterns.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
  } = {}
): Promise<string[]> {
  return fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || ['**/node_modules/**', '**/dist/**'],
    absolute: options.absolute ?? true,
    onlyFiles: true,
  });
}

/**
 * Expand CLI file arguments into concrete paths.
 *
 * Literal paths are kept as given (in argument order) so a missing file is
 * reported by name; arguments containing glob syntax are expanded and sorted.
 */
export async function expandFileArgs(args: string[], cwd: string = process.cwd()): Promise<string[]> {
  const files: string[] = [];
  const seen = new Set<string>();

  for (const arg of args) {
    const matches = fg.isDynamicPattern(arg)
      ? (await globFiles(arg, { cwd, absolute: false })).sort()
      : [arg];

    for (const match of matches) {
      const key = path.resolve(cwd, match);
      if (!seen.has(key)) {
        seen.add(key);
        files.push(match);
      }
    }
  }

  return files;
}
