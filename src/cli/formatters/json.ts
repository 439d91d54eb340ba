import type { FirewallRule } from '../../core/rules/types.js';
import type { FileRules, FormatOptions, IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 *
 * Rules serialize as-is: `type` tags the rule kind, `kind` tags clauses and
 * addresses, and absent direction or interface is `null`.
 */
export class JsonFormatter implements IFormatter {
  private indent: number;

  constructor(options: Partial<FormatOptions> = {}) {
    this.indent = options.jsonIndent ?? 2;
  }

  formatRules(rules: readonly FirewallRule[]): string {
    return JSON.stringify(rules, null, this.indent);
  }

  formatBatch(results: readonly FileRules[]): string {
    return JSON.stringify(
      results.map(({ file, rules }) => ({ file, rules })),
      null,
      this.indent
    );
  }
}
