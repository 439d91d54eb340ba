/**
 * Tests for the PEG combinators.
 */
import { describe, it, expect } from 'vitest';
import {
  choice,
  createSeparator,
  keyword,
  literal,
  matchEntire,
  not,
  oneOrMore,
  optional,
  rule,
  seq,
  token,
  zeroOrMore,
} from '../../../../src/core/grammar/peg.js';

const isWordChar = (ch: string): boolean => /\w/.test(ch);

describe('PEG combinators', () => {
  describe('literal', () => {
    it('should match exact text as a named node', () => {
      const result = matchEntire(rule('ident', literal('abc')), 'abc');

      expect(result).toEqual({
        ok: true,
        node: { rule: 'ident', start: 0, end: 3, text: 'abc', children: [] },
      });
    });

    it('should report the quoted literal when it does not match', () => {
      const result = matchEntire(rule('ident', literal('abc')), 'abd');

      expect(result).toEqual({ ok: false, failure: { offset: 0, expected: ['"abc"'] } });
    });
  });

  describe('keyword', () => {
    const allow = rule('action', keyword('allow', isWordChar));

    it('should match a whole word', () => {
      expect(matchEntire(allow, 'allow').ok).toBe(true);
    });

    it('should not match the start of a longer word', () => {
      expect(matchEntire(allow, 'allowed')).toEqual({
        ok: false,
        failure: { offset: 0, expected: ['"allow"'] },
      });
    });
  });

  describe('token', () => {
    it('should treat an empty match as a failure', () => {
      const result = matchEntire(rule('ident', token(/a*/, 'letters')), '');

      expect(result).toEqual({ ok: false, failure: { offset: 0, expected: ['letters'] } });
    });

    it('should match at the current offset only', () => {
      const matcher = rule('line', seq(literal('x'), rule('ident', token(/[0-9]+/, 'digits'))));
      const result = matchEntire(matcher, 'x42');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.node.children).toEqual([
          { rule: 'ident', start: 1, end: 3, text: '42', children: [] },
        ]);
      }
    });
  });

  describe('choice', () => {
    it('should report failures from the alternative that got furthest', () => {
      const matcher = rule('line', choice(seq(literal('ab'), literal('c')), literal('abd')));

      expect(matchEntire(matcher, 'abx')).toEqual({
        ok: false,
        failure: { offset: 2, expected: ['"c"'] },
      });
    });

    it('should collect every label expected at the same offset', () => {
      const matcher = rule('line', choice(literal('a'), literal('b'), literal('c')));

      expect(matchEntire(matcher, 'z')).toEqual({
        ok: false,
        failure: { offset: 0, expected: ['"a"', '"b"', '"c"'] },
      });
    });
  });

  describe('optional', () => {
    it('should succeed without consuming input', () => {
      const matcher = rule('line', seq(optional(literal('-')), literal('1')));

      expect(matchEntire(matcher, '1').ok).toBe(true);
      expect(matchEntire(matcher, '-1').ok).toBe(true);
    });
  });

  describe('repetition', () => {
    const item = rule('ident', literal('a'));

    it('should collect every match of zeroOrMore', () => {
      const result = matchEntire(rule('file', zeroOrMore(item)), 'aaa');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.node.children).toHaveLength(3);
        expect(result.node.children[2]).toEqual({ rule: 'ident', start: 2, end: 3, text: 'a', children: [] });
      }
    });

    it('should accept empty input for zeroOrMore', () => {
      const result = matchEntire(rule('file', zeroOrMore(item)), '');

      expect(result).toEqual({
        ok: true,
        node: { rule: 'file', start: 0, end: 0, text: '', children: [] },
      });
    });

    it('should stop zeroOrMore on an empty match', () => {
      const result = matchEntire(rule('file', zeroOrMore(optional(literal('a')))), 'aa');

      expect(result.ok).toBe(true);
    });

    it('should require at least one match for oneOrMore', () => {
      expect(matchEntire(rule('file', oneOrMore(item)), '')).toEqual({
        ok: false,
        failure: { offset: 0, expected: ['"a"'] },
      });
      expect(matchEntire(rule('file', oneOrMore(item)), 'aa').ok).toBe(true);
    });
  });

  describe('not', () => {
    const word = rule('ident', seq(not(literal('x')), token(/[a-z]+/, 'word')));

    it('should fail without reporting when the lookahead matches', () => {
      expect(matchEntire(word, 'x')).toEqual({ ok: false, failure: { offset: 0, expected: [] } });
    });

    it('should succeed without consuming input otherwise', () => {
      const result = matchEntire(word, 'yes');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.node.text).toBe('yes');
      }
    });
  });

  describe('end of input', () => {
    it('should report trailing text', () => {
      expect(matchEntire(rule('ident', literal('a')), 'ab')).toEqual({
        ok: false,
        failure: { offset: 1, expected: ['end of input'] },
      });
    });
  });

  describe('createSeparator', () => {
    const sep = createSeparator((input, pos) => pos >= input.length);
    const pair = rule('line', seq(literal('a'), sep(literal('b'))));

    it('should require whitespace between tokens', () => {
      expect(matchEntire(pair, 'a \tb').ok).toBe(true);
      expect(matchEntire(pair, 'ab')).toEqual({
        ok: false,
        failure: { offset: 1, expected: ['whitespace'] },
      });
    });

    it('should name the missing token at a line boundary', () => {
      expect(matchEntire(pair, 'a')).toEqual({
        ok: false,
        failure: { offset: 1, expected: ['"b"'] },
      });
    });
  });

  describe('matchEntire', () => {
    it('should throw when the matcher produces no node', () => {
      expect(() => matchEntire(literal('a'), 'a')).toThrow('Top-level matcher must be a named rule');
    });
  });
});
