/**
 * Firewall rule parsing exports.
 */
export * from './types.js';
export * from './diagnostics.js';
export { buildIpSpec } from './address.js';
export { buildRules } from './builder.js';
export { parseRules, parseRulesOrThrow, type ParseResult } from './parser.js';
export * from './stringify.js';
