/**
 * Firewall rule type definitions.
 */
import type { ACTIONS, DIRECTIONS, PROTOCOLS } from '../grammar/firewall.js';

export type Action = (typeof ACTIONS)[number];
export type Direction = (typeof DIRECTIONS)[number];
export type Protocol = (typeof PROTOCOLS)[number];

/**
 * A literal IPv4 or IPv6 address, optionally a CIDR network.
 */
export interface IpSpec {
  readonly version: 4 | 6;
  /** Address text as written, without the prefix */
  readonly address: string;
  /** CIDR prefix length, or null for a single host */
  readonly prefixLength: number | null;
}

/**
 * A `from`/`to` target. `internal` and `external` are symbolic: the caller's
 * network context decides what they cover.
 */
export type Address =
  | { readonly kind: 'any' }
  | { readonly kind: 'internal' }
  | { readonly kind: 'external' }
  | { readonly kind: 'ip'; readonly ip: IpSpec };

export type Clause =
  | { readonly kind: 'from'; readonly address: Address }
  | { readonly kind: 'to'; readonly address: Address }
  | { readonly kind: 'port'; readonly port: number }
  | { readonly kind: 'proto'; readonly protocol: Protocol };

export type ClauseKind = Clause['kind'];

/**
 * `allow ssh`: an action applied to a named service.
 */
export interface ServiceRule {
  readonly type: 'service';
  readonly action: Action;
  readonly service: string;
}

/**
 * `allow in on eth0 from internal port 443`: an action applied to traffic
 * matching every clause.
 */
export interface AddressRule {
  readonly type: 'address';
  readonly action: Action;
  readonly direction: Direction | null;
  readonly interface: string | null;
  /** At least one clause, in source order */
  readonly clauses: readonly [Clause, ...Clause[]];
}

export type FirewallRule = ServiceRule | AddressRule;

/**
 * How repeated clause kinds within one rule are treated.
 * - allow: every clause is kept in source order
 * - reject: the second clause of a kind is a validation error
 */
export type DuplicateClausePolicy = 'allow' | 'reject';

export interface ParseOptions {
  duplicateClauses?: DuplicateClausePolicy;
}
