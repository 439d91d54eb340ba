/**
 * Helpers shared by the parse and check commands.
 */
import * as path from 'node:path';
import type { z } from 'zod';
import { loadConfig } from '../../core/config/loader.js';
import { DuplicateClausePolicySchema, type Config } from '../../core/config/schema.js';
import type { DuplicateClausePolicy } from '../../core/rules/types.js';
import { ErrorCodes, SystemError } from '../../utils/errors.js';
import { expandFileArgs, fileExists, readFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';

/** Options every command accepts through the root program. */
export type GlobalOptions = {
  verbose?: boolean;
  quiet?: boolean;
};

export interface SourceFile {
  /** Path as given on the command line (or as matched by a glob) */
  file: string;
  source: string;
}

/**
 * Validate a string option against an enum schema.
 */
export function resolveChoice<T extends z.ZodType<string>>(
  schema: T,
  value: string,
  optionName: string
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new SystemError(
      ErrorCodes.INVALID_OPTION,
      `Invalid ${optionName}: ${value}`,
      { option: optionName, value }
    );
  }
  return result.data;
}

/**
 * Load config and apply its log level; --verbose and --quiet win over it.
 */
export async function loadCommandConfig(
  cwd: string,
  configPath: string | undefined,
  globals: GlobalOptions
): Promise<Config> {
  const config = await loadConfig(cwd, configPath);

  if (globals.verbose) {
    log.setLevel('debug');
  } else if (globals.quiet) {
    log.setLevel('error');
  } else {
    log.setLevel(config.log_level);
  }

  log.debug('Loaded configuration', { config });
  return config;
}

export function resolveDuplicateClauses(option: string | undefined, config: Config): DuplicateClausePolicy {
  return option === undefined
    ? config.parser.duplicate_clauses
    : resolveChoice(DuplicateClausePolicySchema, option, '--duplicate-clauses value');
}

/**
 * Expand file arguments and read every file.
 */
export async function readSources(args: string[], cwd: string): Promise<SourceFile[]> {
  const files = await expandFileArgs(args, cwd);
  if (files.length === 0) {
    throw new SystemError(
      ErrorCodes.NO_INPUT_FILES,
      `No files matched: ${args.join(' ')}`,
      { patterns: args }
    );
  }

  const sources: SourceFile[] = [];
  for (const file of files) {
    const fullPath = path.resolve(cwd, file);
    if (!(await fileExists(fullPath))) {
      throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `File not found: ${file}`, { file });
    }
    sources.push({ file, source: await readFile(fullPath) });
  }

  log.debug(`Read ${sources.length} file(s)`, { files });
  return sources;
}
