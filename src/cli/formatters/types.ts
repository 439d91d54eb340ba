/**
 * Formatter type definitions.
 */
import type { FirewallRule } from '../../core/rules/types.js';

export type { OutputFormat } from '../../core/config/schema.js';

/**
 * The rules parsed from one input file.
 */
export interface FileRules {
  file: string;
  rules: FirewallRule[];
}

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Spaces of JSON indentation; 0 prints one line */
  jsonIndent: number;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  /**
   * Format the rules of a single file.
   */
  formatRules(rules: readonly FirewallRule[]): string;

  /**
   * Format the rules of several files, each labelled by its path.
   */
  formatBatch(results: readonly FileRules[]): string;
}
