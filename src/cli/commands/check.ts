import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { diagnosticCode, formatDiagnostic, type ParseDiagnostic } from '../../core/rules/diagnostics.js';
import { parseRules } from '../../core/rules/parser.js';
import { logger as log } from '../../utils/logger.js';
import {
  loadCommandConfig,
  readSources,
  resolveDuplicateClauses,
  type GlobalOptions,
} from './parse-helpers.js';

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Check that rules files parse, reporting every failing file')
    .argument('<files...>', 'Rules files or glob patterns')
    .option('--json', 'Output a JSON report')
    .option('--duplicate-clauses <policy>', 'Repeated clause kinds in one rule: allow or reject')
    .option('--no-color', 'Disable colored output')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (files: string[], _options: CheckOptions, command: Command) => {
      try {
        const report = await runCheck(files, command.optsWithGlobals<CheckOptions>());
        if (!report.valid) process.exit(1);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

type CheckOptions = GlobalOptions & {
  json?: boolean;
  duplicateClauses?: string;
  color: boolean;
  config: string;
};

export interface FileCheck {
  file: string;
  valid: boolean;
  ruleCount: number;
  error?: ParseDiagnostic & { code: string };
}

export interface CheckReport {
  valid: boolean;
  files: FileCheck[];
}

/**
 * Parse every file independently and print one line per file.
 */
export async function runCheck(
  files: string[],
  options: CheckOptions,
  cwd: string = process.cwd()
): Promise<CheckReport> {
  const config = await loadCommandConfig(cwd, options.config, options);
  const duplicateClauses = resolveDuplicateClauses(options.duplicateClauses, config);
  const colors = options.color && config.output.colors;

  const checks: FileCheck[] = [];
  for (const { file, source } of await readSources(files, cwd)) {
    const result = parseRules(source, { duplicateClauses });

    if (result.ok) {
      checks.push({ file, valid: true, ruleCount: result.rules.length });
      if (!options.json) log.success(`${file} (${result.rules.length} rules)`);
      continue;
    }

    checks.push({
      file,
      valid: false,
      ruleCount: 0,
      error: { ...result.error, code: diagnosticCode(result.error) },
    });
    if (!options.json) {
      log.fail(file);
      console.log(formatDiagnostic(result.error, source, { file, colors }));
    }
  }

  const report: CheckReport = { valid: checks.every((c) => c.valid), files: checks };

  if (options.json) {
    console.log(JSON.stringify(report, null, config.output.json_indent));
  } else {
    const failed = checks.filter((c) => !c.valid).length;
    log.info(`${checks.length - failed} of ${checks.length} file(s) parsed`);
  }

  return report;
}
