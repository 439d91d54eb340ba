/**
 * Grammar engine exports.
 */
export * from './types.js';
export * from './peg.js';
export * from './firewall.js';
