/**
 * Turns a matched `file` parse tree into typed firewall rules.
 */
import type { ParseNode, RuleName } from '../grammar/types.js';
import { ACTIONS, ADDRESS_KEYWORDS, DIRECTIONS, PROTOCOLS } from '../grammar/firewall.js';
import { RuleParserError, ErrorCodes } from '../../utils/errors.js';
import { buildIpSpec } from './address.js';
import { validationDiagnostic, type Checked } from './diagnostics.js';
import type {
  Address,
  AddressRule,
  Clause,
  ClauseKind,
  Direction,
  FirewallRule,
  ParseOptions,
  ServiceRule,
} from './types.js';

const MAX_PORT = 65535;

type ClauseRule = 'from_clause' | 'to_clause' | 'port_clause' | 'proto_clause';

function unexpected(node: ParseNode, context: string): RuleParserError {
  return new RuleParserError(
    ErrorCodes.INTERNAL_ERROR,
    `Unexpected ${node.rule} node in ${context} at offset ${node.start}`,
    { rule: node.rule, offset: node.start }
  );
}

function child(node: ParseNode, rule: RuleName): ParseNode {
  const found = node.children.find((c) => c.rule === rule);
  if (!found) {
    throw new RuleParserError(
      ErrorCodes.INTERNAL_ERROR,
      `${node.rule} node at offset ${node.start} has no ${rule}`,
      { rule: node.rule, offset: node.start }
    );
  }
  return found;
}

/**
 * Map a keyword node onto its member of a closed word list.
 */
function keywordOf<T extends string>(words: readonly T[], node: ParseNode): T {
  const word = words.find((w) => w === node.text);
  if (word === undefined) throw unexpected(node, `${node.rule} keyword list`);
  return word;
}

class RuleBuilder {
  constructor(
    private readonly source: string,
    private readonly options: Required<ParseOptions>
  ) {}

  buildFile(file: ParseNode): Checked<FirewallRule[]> {
    const rules: FirewallRule[] = [];
    for (const line of file.children) {
      const built = this.buildLine(line);
      if (!built.ok) return built;
      if (built.value) rules.push(built.value);
    }
    return { ok: true, value: rules };
  }

  /**
   * A line holds at most one rule; comment-only and blank lines yield null.
   */
  private buildLine(line: ParseNode): Checked<FirewallRule | null> {
    if (line.rule !== 'line') throw unexpected(line, 'file');

    for (const node of line.children) {
      switch (node.rule) {
        case 'service_rule':
          return { ok: true, value: this.buildServiceRule(node) };
        case 'addr_rule':
          return this.buildAddressRule(node);
        case 'comment':
          break;
        default:
          throw unexpected(node, 'line');
      }
    }
    return { ok: true, value: null };
  }

  private buildServiceRule(node: ParseNode): ServiceRule {
    return {
      type: 'service',
      action: keywordOf(ACTIONS, child(node, 'action')),
      service: child(node, 'ident').text,
    };
  }

  private buildAddressRule(node: ParseNode): Checked<AddressRule> {
    let direction: Direction | null = null;
    let iface: string | null = null;
    const clauses: Clause[] = [];
    const seen = new Set<ClauseKind>();

    for (const part of node.children) {
      switch (part.rule) {
        case 'action':
          break;
        case 'direction':
          direction = keywordOf(DIRECTIONS, part);
          break;
        case 'interface_clause':
          iface = child(part, 'ident').text;
          break;
        case 'from_clause':
        case 'to_clause':
        case 'port_clause':
        case 'proto_clause': {
          const built = this.clauseBuilders[part.rule](part);
          if (!built.ok) return built;
          const clause = built.value;
          if (this.options.duplicateClauses === 'reject' && seen.has(clause.kind)) {
            return {
              ok: false,
              error: validationDiagnostic(
                this.source,
                part.start,
                'DuplicateClause',
                part.text,
                `duplicate ${clause.kind} clause "${part.text}"`
              ),
            };
          }
          seen.add(clause.kind);
          clauses.push(clause);
          break;
        }
        default:
          throw unexpected(part, 'addr_rule');
      }
    }

    const [first, ...rest] = clauses;
    if (!first) throw unexpected(node, 'file (address rule without clauses)');

    return {
      ok: true,
      value: {
        type: 'address',
        action: keywordOf(ACTIONS, child(node, 'action')),
        direction,
        interface: iface,
        clauses: [first, ...rest],
      },
    };
  }

  private readonly clauseBuilders: Record<ClauseRule, (node: ParseNode) => Checked<Clause>> = {
    from_clause: (node) => this.mapAddress(node, (address) => ({ kind: 'from', address })),
    to_clause: (node) => this.mapAddress(node, (address) => ({ kind: 'to', address })),
    port_clause: (node) => this.buildPort(child(node, 'port_number')),
    proto_clause: (node) => ({
      ok: true,
      value: { kind: 'proto', protocol: keywordOf(PROTOCOLS, child(node, 'protocol')) },
    }),
  };

  private mapAddress(node: ParseNode, wrap: (address: Address) => Clause): Checked<Clause> {
    const built = this.buildAddress(child(node, 'addr'));
    return built.ok ? { ok: true, value: wrap(built.value) } : built;
  }

  private buildAddress(node: ParseNode): Checked<Address> {
    const [ip] = node.children;
    if (ip) {
      if (ip.rule !== 'ip') throw unexpected(ip, 'addr');
      const spec = buildIpSpec(ip, this.source);
      return spec.ok ? { ok: true, value: { kind: 'ip', ip: spec.value } } : spec;
    }
    return { ok: true, value: { kind: keywordOf(ADDRESS_KEYWORDS, node) } };
  }

  private buildPort(node: ParseNode): Checked<Clause> {
    const port = Number(node.text);
    if (port > MAX_PORT) {
      return {
        ok: false,
        error: validationDiagnostic(
          this.source,
          node.start,
          'PortOutOfRange',
          node.text,
          `port ${node.text} is out of range (0-${MAX_PORT})`
        ),
      };
    }
    return { ok: true, value: { kind: 'port', port } };
  }
}

/**
 * Build the rules of a matched `file` node, stopping at the first
 * validation error.
 */
export function buildRules(
  file: ParseNode,
  source: string,
  options: ParseOptions = {}
): Checked<FirewallRule[]> {
  const builder = new RuleBuilder(source, {
    duplicateClauses: options.duplicateClauses ?? 'allow',
  });
  return builder.buildFile(file);
}
