import { Command } from 'commander';
import * as path from 'node:path';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { OutputFormatSchema } from '../../core/config/schema.js';
import { formatDiagnostic } from '../../core/rules/diagnostics.js';
import { parseRules } from '../../core/rules/parser.js';
import { logger as log } from '../../utils/logger.js';
import { writeFile } from '../../utils/file-system.js';
import { createFormatter, formatResults, type FileRules } from '../formatters/index.js';
import {
  loadCommandConfig,
  readSources,
  resolveChoice,
  resolveDuplicateClauses,
  type GlobalOptions,
} from './parse-helpers.js';

/**
 * Create the parse command.
 */
export function createParseCommand(): Command {
  return new Command('parse')
    .description('Parse rules files and print the structured rules')
    .argument('<files...>', 'Rules files or glob patterns')
    .option('-f, --format <format>', 'Output format: debug, json, or human (default: from config, else debug)')
    .option('-o, --output <path>', 'Write output to a file instead of stdout')
    .option('--duplicate-clauses <policy>', 'Repeated clause kinds in one rule: allow or reject')
    .option('--no-color', 'Disable colored output')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (files: string[], _options: ParseOptions, command: Command) => {
      try {
        const ok = await runParse(files, command.optsWithGlobals<ParseOptions>());
        if (!ok) process.exit(1);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

type ParseOptions = GlobalOptions & {
  format?: string;
  output?: string;
  duplicateClauses?: string;
  color: boolean;
  config: string;
};

/**
 * Parse every file and print (or write) the rules.
 * Returns false after printing the diagnostic of the first file that fails.
 */
export async function runParse(
  files: string[],
  options: ParseOptions,
  cwd: string = process.cwd()
): Promise<boolean> {
  const config = await loadCommandConfig(cwd, options.config, options);
  const format = resolveChoice(OutputFormatSchema, options.format ?? config.output.format, 'format');
  const duplicateClauses = resolveDuplicateClauses(options.duplicateClauses, config);
  const colors = options.color && config.output.colors;

  const results: FileRules[] = [];
  for (const { file, source } of await readSources(files, cwd)) {
    const result = parseRules(source, { duplicateClauses });
    if (!result.ok) {
      console.error(formatDiagnostic(result.error, source, { file, colors }));
      return false;
    }
    log.debug(`Parsed ${result.rules.length} rule(s) from ${file}`);
    results.push({ file, rules: result.rules });
  }

  // Files never get color codes
  const formatter = createFormatter(format, {
    colors: colors && !options.output,
    jsonIndent: config.output.json_indent,
  });
  const output = formatResults(formatter, results);

  if (options.output) {
    const target = path.resolve(cwd, options.output);
    await writeFile(target, `${output}\n`);
    log.info(`Wrote ${format} output to ${options.output}`);
  } else {
    console.log(output);
  }

  return true;
}
