/**
 * Grammar engine type definitions.
 */

/**
 * Every named rule of the firewall grammar. Only named rules produce parse
 * tree nodes; whitespace, newlines and lookaheads are matched silently.
 */
export type RuleName =
  | 'file'
  | 'line'
  | 'service_rule'
  | 'addr_rule'
  | 'action'
  | 'direction'
  | 'interface_clause'
  | 'from_clause'
  | 'to_clause'
  | 'port_clause'
  | 'proto_clause'
  | 'protocol'
  | 'addr'
  | 'ip'
  | 'ipv4'
  | 'ipv6'
  | 'cidr_prefix'
  | 'port_number'
  | 'ident'
  | 'comment';

/**
 * A matched span of the input, tagged by the rule that matched it.
 */
export interface ParseNode {
  rule: RuleName;
  /** Offset of the first matched character */
  start: number;
  /** Offset one past the last matched character */
  end: number;
  /** The matched source text */
  text: string;
  /** Named sub-matches in source order */
  children: ParseNode[];
}

/**
 * Where and why matching stopped: the furthest offset any alternative
 * reached, and every construct that was tried there.
 */
export interface MatchFailure {
  offset: number;
  expected: string[];
}

export type MatchOutcome =
  | { ok: true; node: ParseNode }
  | { ok: false; failure: MatchFailure };

/**
 * Mutable bookkeeping shared by all matchers during one match call.
 */
export interface MatchState {
  readonly input: string;
  furthest: number;
  expected: Set<string>;
  /** Non-zero inside lookaheads, where failures are not reported */
  silent: number;
}

/**
 * Result of a successful matcher: the offset reached and the named nodes
 * produced along the way.
 */
export interface MatchStep {
  end: number;
  nodes: ParseNode[];
}

/**
 * A grammar expression. Returns null when it does not match at `pos`.
 */
export type Matcher = (state: MatchState, pos: number) => MatchStep | null;
