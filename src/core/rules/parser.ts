/**
 * Public parse API.
 */
import { matchFile } from '../grammar/firewall.js';
import { buildRules } from './builder.js';
import { RuleParseError, syntaxDiagnostic, type ParseDiagnostic } from './diagnostics.js';
import type { FirewallRule, ParseOptions } from './types.js';

export type ParseResult =
  | { ok: true; rules: FirewallRule[] }
  | { ok: false; error: ParseDiagnostic };

/**
 * Parse the full text of a rules file.
 *
 * Returns every rule in source order, or the first syntax or validation
 * error. Comment-only and blank lines produce no rule. Pure and
 * deterministic: the same text always yields an equal result.
 *
 * @example
 * ```ts
 * const result = parseRules('allow ssh\ndeny out to 8.8.8.8 port 53 proto udp');
 * if (result.ok) console.log(result.rules.length); // 2
 * ```
 */
export function parseRules(text: string, options: ParseOptions = {}): ParseResult {
  const matched = matchFile(text);
  if (!matched.ok) {
    return { ok: false, error: syntaxDiagnostic(text, matched.failure) };
  }

  const built = buildRules(matched.node, text, options);
  return built.ok ? { ok: true, rules: built.value } : { ok: false, error: built.error };
}

/**
 * Like parseRules, but throws a RuleParseError instead of returning the
 * diagnostic.
 */
export function parseRulesOrThrow(text: string, options: ParseOptions = {}): FirewallRule[] {
  const result = parseRules(text, options);
  if (!result.ok) {
    throw new RuleParseError(result.error);
  }
  return result.rules;
}
