/**
 * The firewall rule grammar.
 *
 *   file             = line (NEWLINE line)* EOI
 *   line             = WS? (service_rule line_end | addr_rule line_end | line_end)
 *   line_end         = WS? comment? &(NEWLINE | EOI)
 *   service_rule     = action WS !reserved ident
 *   addr_rule        = action (WS direction)? (WS interface_clause)? (WS clause)+
 *   clause           = from_clause | to_clause | port_clause | proto_clause
 *   interface_clause = "on" WS ident
 *   from_clause      = "from" WS addr
 *   to_clause        = "to" WS addr
 *   port_clause      = "port" WS port_number
 *   proto_clause     = "proto" WS protocol
 *   addr             = "any" | "internal" | "external" | ip
 *   ip               = (ipv4 | ipv6) ("/" cidr_prefix)?
 */
import {
  choice,
  createSeparator,
  endOfInput,
  keyword,
  literal,
  matchEntire,
  not,
  oneOrMore,
  optional,
  recordFailure,
  rule,
  seq,
  token,
  whitespace,
  zeroOrMore,
} from './peg.js';
import type { Matcher, MatchOutcome, RuleName } from './types.js';

export const ACTIONS = ['allow', 'deny', 'reject', 'limit'] as const;
export const DIRECTIONS = ['in', 'out'] as const;
export const PROTOCOLS = ['tcp', 'udp', 'any'] as const;
export const ADDRESS_KEYWORDS = ['any', 'internal', 'external'] as const;

/** Words that cannot name a service, since they open an address rule. */
export const RESERVED_WORDS = ['in', 'out', 'on', 'from', 'to', 'port', 'proto'] as const;

export const COMMENT_CHAR = '#';

const WORD_CHAR = /[A-Za-z0-9_-]/;

function isWordChar(ch: string): boolean {
  return WORD_CHAR.test(ch);
}

function isLineBoundary(input: string, pos: number): boolean {
  if (pos >= input.length) return true;
  const ch = input[pos];
  return ch === '\n' || ch === '\r' || ch === COMMENT_CHAR;
}

const kw = (word: string): Matcher => keyword(word, isWordChar);
const oneOf = (words: readonly string[]): Matcher => choice(...words.map(kw));
const sep = createSeparator(isLineBoundary);

const lineBreakAhead: Matcher = (state, pos) => {
  const input = state.input;
  if (pos >= input.length || input[pos] === '\n' || input.startsWith('\r\n', pos)) {
    return { end: pos, nodes: [] };
  }
  recordFailure(state, pos, 'end of line');
  return null;
};

const action = rule('action', oneOf(ACTIONS));
const direction = rule('direction', oneOf(DIRECTIONS));
const protocol = rule('protocol', oneOf(PROTOCOLS));
const ident = rule('ident', token(/[A-Za-z0-9_-]+/, 'identifier'));
const portNumber = rule('port_number', token(/[0-9]+/, 'port number'));
const cidrPrefix = rule('cidr_prefix', token(/[0-9]+/, 'prefix length'));
const ipv4 = rule('ipv4', token(/[0-9]+\.[0-9]+\.[0-9]+\.[0-9]+/, 'IPv4 address'));
const ipv6 = rule('ipv6', token(/[0-9A-Fa-f]*:[0-9A-Fa-f:.]*/, 'IPv6 address'));
const ip = rule('ip', seq(choice(ipv4, ipv6), optional(seq(literal('/'), cidrPrefix))));
const addr = rule('addr', choice(oneOf(ADDRESS_KEYWORDS), ip));

const interfaceClause = rule('interface_clause', seq(kw('on'), sep(ident)));
const fromClause = rule('from_clause', seq(kw('from'), sep(addr)));
const toClause = rule('to_clause', seq(kw('to'), sep(addr)));
const portClause = rule('port_clause', seq(kw('port'), sep(portNumber)));
const protoClause = rule('proto_clause', seq(kw('proto'), sep(protocol)));
const clause = choice(fromClause, toClause, portClause, protoClause);

const serviceRule = rule('service_rule', seq(action, sep(seq(not(oneOf(RESERVED_WORDS)), ident))));
const addrRule = rule(
  'addr_rule',
  seq(action, optional(sep(direction)), optional(sep(interfaceClause)), oneOrMore(sep(clause)))
);

const comment = rule('comment', token(/#[^\r\n]*/, 'comment'));
const lineEnd = seq(optional(whitespace), optional(comment), lineBreakAhead);
const line = rule(
  'line',
  seq(optional(whitespace), choice(seq(serviceRule, lineEnd), seq(addrRule, lineEnd), lineEnd))
);
const newline = token(/\r?\n/, 'end of line');
const file = rule('file', seq(line, zeroOrMore(seq(newline, line)), endOfInput));

const GRAMMAR: Record<RuleName, Matcher> = {
  file,
  line,
  service_rule: serviceRule,
  addr_rule: addrRule,
  action,
  direction,
  interface_clause: interfaceClause,
  from_clause: fromClause,
  to_clause: toClause,
  port_clause: portClause,
  proto_clause: protoClause,
  protocol,
  addr,
  ip,
  ipv4,
  ipv6,
  cidr_prefix: cidrPrefix,
  port_number: portNumber,
  ident,
  comment,
};

/**
 * Match `input` in full against one named grammar rule.
 */
export function matchRule(name: RuleName, input: string): MatchOutcome {
  return matchEntire(GRAMMAR[name], input);
}

/**
 * Match a whole rules file.
 */
export function matchFile(input: string): MatchOutcome {
  return matchEntire(file, input);
}
