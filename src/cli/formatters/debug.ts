import { inspect } from 'node:util';
import type { FirewallRule } from '../../core/rules/types.js';
import type { FileRules, FormatOptions, IFormatter } from './types.js';

/**
 * Debug formatter: the rule objects as Node prints them.
 */
export class DebugFormatter implements IFormatter {
  private colors: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.colors = options.colors ?? false;
  }

  formatRules(rules: readonly FirewallRule[]): string {
    return inspect(rules, { depth: null, colors: this.colors });
  }

  formatBatch(results: readonly FileRules[]): string {
    return results
      .map(({ file, rules }) => `==> ${file} <==\n${this.formatRules(rules)}`)
      .join('\n\n');
  }
}
