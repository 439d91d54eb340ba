/**
 * Canonical text form of rules. Parsing the output yields equal rules.
 */
import type { Address, Clause, FirewallRule, IpSpec } from './types.js';

export function stringifyIp(ip: IpSpec): string {
  return ip.prefixLength === null ? ip.address : `${ip.address}/${ip.prefixLength}`;
}

export function stringifyAddress(address: Address): string {
  return address.kind === 'ip' ? stringifyIp(address.ip) : address.kind;
}

export function stringifyClause(clause: Clause): string {
  switch (clause.kind) {
    case 'from':
    case 'to':
      return `${clause.kind} ${stringifyAddress(clause.address)}`;
    case 'port':
      return `port ${clause.port}`;
    case 'proto':
      return `proto ${clause.protocol}`;
    default: {
      const exhaustive: never = clause;
      return exhaustive;
    }
  }
}

export function stringifyRule(rule: FirewallRule): string {
  if (rule.type === 'service') {
    return `${rule.action} ${rule.service}`;
  }

  const parts: string[] = [rule.action];
  if (rule.direction) parts.push(rule.direction);
  if (rule.interface) parts.push(`on ${rule.interface}`);
  parts.push(...rule.clauses.map(stringifyClause));
  return parts.join(' ');
}

/**
 * One rule per line, newline-terminated.
 */
export function stringifyRules(rules: readonly FirewallRule[]): string {
  return rules.map((rule) => `${stringifyRule(rule)}\n`).join('');
}
