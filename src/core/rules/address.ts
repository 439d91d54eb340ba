/**
 * IP literal validation.
 *
 * The grammar only fixes the shape of an address (digits and dots, or hex
 * groups and colons); range and structure checks happen here so they can be
 * reported as validation errors pointing at the offending literal.
 */
import type { ParseNode } from '../grammar/types.js';
import { RuleParserError, ErrorCodes } from '../../utils/errors.js';
import { validationDiagnostic, type Checked, type ValidationDiagnostic } from './diagnostics.js';
import type { IpSpec } from './types.js';

const MAX_PREFIX = { 4: 32, 6: 128 } as const;
const HEX_GROUP = /^[0-9A-Fa-f]{1,4}$/;
const IPV4_TAIL = /^[0-9]+\.[0-9]+\.[0-9]+\.[0-9]+$/;

/**
 * Check every octet of a dotted-quad address starting at `offset`.
 */
function checkIpv4(text: string, offset: number, source: string, whole: string = text): ValidationDiagnostic | null {
  let cursor = offset;
  for (const octet of text.split('.')) {
    if (Number(octet) > 255) {
      return validationDiagnostic(
        source,
        cursor,
        'InvalidIpOctet',
        octet,
        `IPv4 octet ${octet} in ${whole} is out of range (0-255)`
      );
    }
    cursor += octet.length + 1;
  }
  return null;
}

/**
 * Check IPv6 group structure: at most one `::`, groups of 1-4 hex digits,
 * eight groups in total (fewer when compressed), and an optional trailing
 * dotted quad counting as two groups.
 */
function checkIpv6(text: string, offset: number, source: string): ValidationDiagnostic | null {
  const malformed = (): ValidationDiagnostic =>
    validationDiagnostic(source, offset, 'InvalidIpAddress', text, `malformed IPv6 address ${text}`);

  const halves = text.split('::');
  if (halves.length > 2) return malformed();

  const compressed = halves.length === 2;
  const groups = halves.flatMap((half) => (half === '' ? [] : half.split(':')));

  let count = 0;
  for (const [index, group] of groups.entries()) {
    if (group.includes('.')) {
      if (index !== groups.length - 1 || !text.endsWith(group) || !IPV4_TAIL.test(group)) {
        return malformed();
      }
      const octetError = checkIpv4(group, offset + text.length - group.length, source, text);
      if (octetError) return octetError;
      count += 2;
    } else if (HEX_GROUP.test(group)) {
      count += 1;
    } else {
      return malformed();
    }
  }

  if (compressed ? count > 7 : count !== 8) return malformed();
  return null;
}

/**
 * Build an IpSpec from an `ip` parse node.
 */
export function buildIpSpec(node: ParseNode, source: string): Checked<IpSpec> {
  const [addressNode, prefixNode] = node.children;
  if (!addressNode || (addressNode.rule !== 'ipv4' && addressNode.rule !== 'ipv6')) {
    throw new RuleParserError(ErrorCodes.INTERNAL_ERROR, `ip node at offset ${node.start} has no address`);
  }

  const version = addressNode.rule === 'ipv4' ? 4 : 6;
  const addressError = version === 4
    ? checkIpv4(addressNode.text, addressNode.start, source)
    : checkIpv6(addressNode.text, addressNode.start, source);
  if (addressError) return { ok: false, error: addressError };

  let prefixLength: number | null = null;
  if (prefixNode) {
    const value = Number(prefixNode.text);
    const max = MAX_PREFIX[version];
    if (value > max) {
      return {
        ok: false,
        error: validationDiagnostic(
          source,
          prefixNode.start,
          'InvalidCidrPrefix',
          prefixNode.text,
          `prefix length ${prefixNode.text} is out of range for IPv${version} (0-${max})`
        ),
      };
    }
    prefixLength = value;
  }

  return { ok: true, value: { version, address: addressNode.text, prefixLength } };
}
