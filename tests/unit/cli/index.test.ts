/**
 * Tests for the CLI program.
 */
import { describe, it, expect } from 'vitest';
import { createCli, VERSION } from '../../../src/cli/index.js';

describe('createCli', () => {
  it('should name the program', () => {
    expect(createCli().name()).toBe('ufw-rules');
  });

  it('should register every command', () => {
    expect(createCli().commands.map((c) => c.name())).toEqual(['parse', 'check', 'help', 'credits']);
  });

  it('should take the version from package.json', () => {
    expect(VERSION).toMatch(/^\d+\.\d+\.\d+/);
    expect(createCli().version()).toBe(VERSION);
  });

  it('should accept the global logging options', () => {
    const flags = createCli().options.map((o) => o.long);

    expect(flags).toEqual(expect.arrayContaining(['--verbose', '--quiet', '--version']));
  });
});
