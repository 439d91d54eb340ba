/**
 * Tests for the canonical text form.
 */
import { describe, it, expect } from 'vitest';
import {
  stringifyAddress,
  stringifyClause,
  stringifyIp,
  stringifyRule,
  stringifyRules,
} from '../../../../src/core/rules/stringify.js';
import { parseRules } from '../../../../src/core/rules/parser.js';
import type { FirewallRule } from '../../../../src/core/rules/types.js';

describe('stringify', () => {
  it('should write an IP with or without its prefix length', () => {
    expect(stringifyIp({ version: 4, address: '10.0.0.0', prefixLength: 8 })).toBe('10.0.0.0/8');
    expect(stringifyIp({ version: 6, address: '::1', prefixLength: null })).toBe('::1');
  });

  it('should write address keywords as themselves', () => {
    expect(stringifyAddress({ kind: 'internal' })).toBe('internal');
    expect(stringifyAddress({ kind: 'ip', ip: { version: 4, address: '1.2.3.4', prefixLength: 0 } })).toBe('1.2.3.4/0');
  });

  it('should write each clause kind', () => {
    expect(stringifyClause({ kind: 'from', address: { kind: 'any' } })).toBe('from any');
    expect(stringifyClause({ kind: 'to', address: { kind: 'external' } })).toBe('to external');
    expect(stringifyClause({ kind: 'port', port: 443 })).toBe('port 443');
    expect(stringifyClause({ kind: 'proto', protocol: 'udp' })).toBe('proto udp');
  });

  it('should write a service rule', () => {
    expect(stringifyRule({ type: 'service', action: 'limit', service: 'ssh' })).toBe('limit ssh');
  });

  it('should write an address rule with its optional parts', () => {
    const rule: FirewallRule = {
      type: 'address',
      action: 'allow',
      direction: 'in',
      interface: 'eth0',
      clauses: [
        { kind: 'from', address: { kind: 'internal' } },
        { kind: 'to', address: { kind: 'external' } },
        { kind: 'port', port: 443 },
        { kind: 'proto', protocol: 'tcp' },
      ],
    };

    expect(stringifyRule(rule)).toBe('allow in on eth0 from internal to external port 443 proto tcp');
  });

  it('should omit absent direction and interface', () => {
    const rule: FirewallRule = {
      type: 'address',
      action: 'deny',
      direction: null,
      interface: null,
      clauses: [{ kind: 'port', port: 22 }],
    };

    expect(stringifyRule(rule)).toBe('deny port 22');
  });

  it('should terminate every rule with a newline', () => {
    expect(stringifyRules([])).toBe('');
    expect(stringifyRules([
      { type: 'service', action: 'allow', service: 'ssh' },
      { type: 'service', action: 'deny', service: 'telnet' },
    ])).toBe('allow ssh\ndeny telnet\n');
  });

  it('should normalize spacing and drop comments', () => {
    const result = parseRules('  allow \t in   port 22   # ssh\n\n# end\n');
    if (!result.ok) throw new Error(result.error.message);

    expect(stringifyRules(result.rules)).toBe('allow in port 22\n');
  });
});
