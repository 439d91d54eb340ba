/**
 * Tests for the check command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { createCheckCommand, runCheck } from '../../../../src/cli/commands/check.js';
import { logger } from '../../../../src/utils/logger.js';

// Mock chalk with pass-through
vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    red: (s: string) => s,
    cyan: (s: string) => s,
    dim: (s: string) => s,
    gray: (s: string) => s,
    blue: (s: string) => s,
  },
}));

const defaults = { color: false, config: '.ufw-rules.yaml' };

describe('check command', () => {
  let testDir: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(async () => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation((() => {
      throw new Error('process.exit called');
    }) as never);

    testDir = join(tmpdir(), `ufw-rules-check-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    await writeFile(join(testDir, 'good.rules'), 'allow ssh\ndeny in from 10.0.0.0/8\n');
    await writeFile(join(testDir, 'bad.rules'), '# web\nallow port 99999\n');
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    processExitSpy.mockRestore();
    logger.setLevel('info');
    await rm(testDir, { recursive: true, force: true });
  });

  describe('createCheckCommand', () => {
    it('should create a command with correct name', () => {
      expect(createCheckCommand().name()).toBe('check');
    });

    it('should have a --json option', () => {
      expect(createCheckCommand().options.some((o) => o.long === '--json')).toBe(true);
    });

    it('should exit with 1 when any file fails', async () => {
      const command = createCheckCommand();

      await expect(
        command.parseAsync(['node', 'test', join(testDir, 'good.rules'), join(testDir, 'bad.rules')])
      ).rejects.toThrow('process.exit called');
      expect(processExitSpy).toHaveBeenCalledWith(1);
    });

    it('should not exit when every file parses', async () => {
      await createCheckCommand().parseAsync(['node', 'test', join(testDir, 'good.rules')]);

      expect(processExitSpy).not.toHaveBeenCalled();
    });
  });

  describe('runCheck', () => {
    it('should print a mark per file and the diagnostic of failures', async () => {
      const report = await runCheck(['good.rules', 'bad.rules'], defaults, testDir);

      expect(report.valid).toBe(false);
      expect(consoleLogSpy.mock.calls).toEqual([
        ['✓ good.rules (2 rules)'],
        ['✗ bad.rules'],
        [
          [
            'bad.rules:2:12 - error V001: port 99999 is out of range (0-65535)',
            '',
            '  2 | allow port 99999',
            '    |            ^',
          ].join('\n'),
        ],
      ]);
      expect(consoleErrorSpy).toHaveBeenCalledWith('[INFO] 1 of 2 file(s) parsed');
    });

    it('should check every file even after a failure', async () => {
      const report = await runCheck(['bad.rules', 'good.rules'], defaults, testDir);

      expect(report.files.map((f) => [f.file, f.valid])).toEqual([
        ['bad.rules', false],
        ['good.rules', true],
      ]);
    });

    it('should print a JSON report', async () => {
      await runCheck(['good.rules', 'bad.rules'], { ...defaults, json: true }, testDir);

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const [[output]] = consoleLogSpy.mock.calls;
      expect(JSON.parse(String(output))).toEqual({
        valid: false,
        files: [
          { file: 'good.rules', valid: true, ruleCount: 2 },
          {
            file: 'bad.rules',
            valid: false,
            ruleCount: 0,
            error: {
              type: 'validation',
              line: 2,
              column: 12,
              offset: 17,
              kind: 'PortOutOfRange',
              literal: '99999',
              message: 'port 99999 is out of range (0-65535)',
              code: 'V001',
            },
          },
        ],
      });
    });

    it('should hide marks under --quiet', async () => {
      const report = await runCheck(['good.rules'], { ...defaults, quiet: true }, testDir);

      expect(report.valid).toBe(true);
      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });

    it('should reject duplicate clauses when asked to', async () => {
      await writeFile(join(testDir, 'dup.rules'), 'allow from any from internal\n');

      const lenient = await runCheck(['dup.rules'], defaults, testDir);
      const strict = await runCheck(['dup.rules'], { ...defaults, duplicateClauses: 'reject' }, testDir);

      expect(lenient.valid).toBe(true);
      expect(strict.files[0].error?.message).toBe('duplicate from clause "from internal"');
    });
  });
});
