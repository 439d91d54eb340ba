/**
 * Tests for logger utility.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Logger } from '../../../src/utils/logger.js';

vi.mock('chalk', () => ({
  default: {
    gray: (s: string) => s,
    blue: (s: string) => s,
    red: (s: string) => s,
    green: (s: string) => s,
  },
}));

describe('Logger', () => {
  const consoleSpy = {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('log levels', () => {
    it('should log debug to stderr when level is debug', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('test message');

      expect(consoleSpy.error).toHaveBeenCalledWith('[DEBUG] test message');
      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should not log debug when level is info', () => {
      const log = new Logger();

      log.debug('test message');

      expect(consoleSpy.error).not.toHaveBeenCalled();
    });

    it('should log info to stderr', () => {
      const log = new Logger();

      log.info('test message');

      expect(consoleSpy.error).toHaveBeenCalledWith('[INFO] test message');
    });

    it('should hide info but keep errors when level is warn', () => {
      const log = new Logger();
      log.setLevel('warn');

      log.info('hidden');
      log.error('shown');

      expect(consoleSpy.error).toHaveBeenCalledTimes(1);
      expect(consoleSpy.error).toHaveBeenCalledWith('[ERROR] shown');
    });

    it('should log nothing when silent', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.error('test message');
      log.success('done');

      expect(consoleSpy.error).not.toHaveBeenCalled();
      expect(consoleSpy.log).not.toHaveBeenCalled();
    });
  });

  describe('data', () => {
    it('should print debug data as indented JSON after the message', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('Read 2 file(s)', { files: 2 });

      expect(consoleSpy.error).toHaveBeenNthCalledWith(1, '[DEBUG] Read 2 file(s)');
      expect(consoleSpy.error).toHaveBeenNthCalledWith(2, '{\n  "files": 2\n}');
    });
  });

  describe('success and fail', () => {
    it('should print marks to stdout', () => {
      const log = new Logger();

      log.success('rules.txt (3 rules)');
      log.fail('bad.txt');

      expect(consoleSpy.log).toHaveBeenNthCalledWith(1, '✓ rules.txt (3 rules)');
      expect(consoleSpy.log).toHaveBeenNthCalledWith(2, '✗ bad.txt');
    });

    it('should be hidden when level is error', () => {
      const log = new Logger();
      log.setLevel('error');

      log.success('ok');
      log.fail('bad');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });
  });
});
