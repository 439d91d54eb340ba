import chalk from 'chalk';
import type { Action, FirewallRule } from '../../core/rules/types.js';
import { stringifyRule } from '../../core/rules/stringify.js';
import type { FileRules, FormatOptions, IFormatter } from './types.js';

const ACTION_COLORS: Record<Action, 'green' | 'red' | 'magenta' | 'yellow'> = {
  allow: 'green',
  deny: 'red',
  reject: 'magenta',
  limit: 'yellow',
};

/**
 * Human-readable output formatter: numbered rules in canonical text form.
 */
export class HumanFormatter implements IFormatter {
  private options: Pick<FormatOptions, 'colors'>;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
    };
  }

  formatRules(rules: readonly FirewallRule[]): string {
    if (rules.length === 0) {
      return this.colorize('(no rules)', 'dim');
    }

    const width = String(rules.length).length;
    return rules
      .map((rule, index) => {
        const number = this.colorize(`${String(index + 1).padStart(width)}.`, 'dim');
        const action = this.colorize(rule.action, ACTION_COLORS[rule.action]);
        const rest = stringifyRule(rule).slice(rule.action.length);
        const kind = this.colorize(rule.type === 'service' ? '[service]' : '[address]', 'dim');
        return `${number} ${action}${rest} ${kind}`;
      })
      .join('\n');
  }

  formatBatch(results: readonly FileRules[]): string {
    return results
      .map(({ file, rules }) => {
        const count = `${rules.length} rule${rules.length === 1 ? '' : 's'}`;
        return `${this.colorize(file, 'bold')} ${this.colorize(`(${count})`, 'dim')}\n${this.formatRules(rules)}`;
      })
      .join('\n\n');
  }

  private colorize(text: string, color: 'green' | 'red' | 'magenta' | 'yellow' | 'dim' | 'bold'): string {
    if (!this.options.colors) return text;
    return chalk[color](text);
  }
}
