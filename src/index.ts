/**
 * ufw-rules: parser and checker for ufw-style firewall rules.
 * Main library exports barrel file.
 */

// Rules
export * from './core/rules/index.js';

// Grammar
export * from './core/grammar/index.js';

// Configuration
export * from './core/config/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
