/**
 * Formatter factory.
 */
import type { FileRules, FormatOptions, IFormatter, OutputFormat } from './types.js';
import { DebugFormatter } from './debug.js';
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';

export * from './types.js';
export { DebugFormatter, HumanFormatter, JsonFormatter };

export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter(options);
    case 'human':
      return new HumanFormatter(options);
    case 'debug':
      return new DebugFormatter(options);
  }
}

/**
 * A single file prints as its bare rule list; several files are labelled.
 */
export function formatResults(formatter: IFormatter, results: readonly FileRules[]): string {
  const [only] = results;
  return results.length === 1 && only ? formatter.formatRules(only.rules) : formatter.formatBatch(results);
}
