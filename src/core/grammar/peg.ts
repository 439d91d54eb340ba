/**
 * Parsing-expression-grammar combinators.
 *
 * Matchers follow PEG semantics: ordered choice commits to the first
 * alternative that matches, repetition is greedy, and a failed sequence
 * backtracks to where it started. Failures are recorded at the furthest
 * offset any matcher reached so a single match call can report the most
 * specific position and every construct that was expected there.
 */
import type { Matcher, MatchOutcome, MatchState, MatchStep, ParseNode, RuleName } from './types.js';

/**
 * Record that `label` was expected at `pos`.
 */
export function recordFailure(state: MatchState, pos: number, label: string): void {
  if (state.silent > 0) return;
  if (pos > state.furthest) {
    state.furthest = pos;
    state.expected = new Set([label]);
  } else if (pos === state.furthest) {
    state.expected.add(label);
  }
}

/**
 * Match an exact string.
 */
export function literal(text: string, label: string = JSON.stringify(text)): Matcher {
  return (state, pos) => {
    if (state.input.startsWith(text, pos)) {
      return { end: pos + text.length, nodes: [] };
    }
    recordFailure(state, pos, label);
    return null;
  };
}

/**
 * Match a whole word: the text itself, not followed by another word character.
 * `allow` does not match the start of `allowed`.
 */
export function keyword(word: string, isWordChar: (ch: string) => boolean): Matcher {
  const label = JSON.stringify(word);
  return (state, pos) => {
    const end = pos + word.length;
    if (state.input.startsWith(word, pos) && !(end < state.input.length && isWordChar(state.input[end]))) {
      return { end, nodes: [] };
    }
    recordFailure(state, pos, label);
    return null;
  };
}

/**
 * Match a regular expression anchored at the current offset.
 * Empty matches count as failures.
 */
export function token(pattern: RegExp, label: string): Matcher {
  const flags = pattern.flags.includes('y') ? pattern.flags : `${pattern.flags}y`;
  const sticky = new RegExp(pattern.source, flags);
  return (state, pos) => {
    sticky.lastIndex = pos;
    const match = sticky.exec(state.input);
    if (match && match[0].length > 0) {
      return { end: pos + match[0].length, nodes: [] };
    }
    recordFailure(state, pos, label);
    return null;
  };
}

// push(...items) passes every node as an argument, which overflows the stack on
// files with a few hundred thousand lines.
function append(target: ParseNode[], items: readonly ParseNode[]): void {
  for (const item of items) target.push(item);
}

export function seq(...matchers: Matcher[]): Matcher {
  return (state, pos) => {
    let end = pos;
    const nodes: ParseNode[] = [];
    for (const matcher of matchers) {
      const step = matcher(state, end);
      if (!step) return null;
      end = step.end;
      append(nodes, step.nodes);
    }
    return { end, nodes };
  };
}

export function choice(...matchers: Matcher[]): Matcher {
  return (state, pos) => {
    for (const matcher of matchers) {
      const step = matcher(state, pos);
      if (step) return step;
    }
    return null;
  };
}

export function optional(matcher: Matcher): Matcher {
  return (state, pos) => matcher(state, pos) ?? { end: pos, nodes: [] };
}

export function zeroOrMore(matcher: Matcher): Matcher {
  return (state, pos) => {
    let end = pos;
    const nodes: ParseNode[] = [];
    for (;;) {
      const step = matcher(state, end);
      // An empty match would repeat forever
      if (!step || step.end === end) break;
      end = step.end;
      append(nodes, step.nodes);
    }
    return { end, nodes };
  };
}

export function oneOrMore(matcher: Matcher): Matcher {
  const rest = zeroOrMore(matcher);
  return (state, pos) => {
    const first = matcher(state, pos);
    if (!first) return null;
    const more = rest(state, first.end);
    if (!more) return first;
    const nodes = first.nodes.slice();
    append(nodes, more.nodes);
    return { end: more.end, nodes };
  };
}

/**
 * Negative lookahead: succeeds without consuming input when `matcher` fails.
 * Failures inside the lookahead are not reported.
 */
export function not(matcher: Matcher): Matcher {
  return (state, pos) => {
    state.silent++;
    try {
      return matcher(state, pos) ? null : { end: pos, nodes: [] };
    } finally {
      state.silent--;
    }
  };
}

/**
 * Wrap a matcher so its span becomes a named parse-tree node.
 */
export function rule(name: RuleName, matcher: Matcher): Matcher {
  return (state, pos) => {
    const step = matcher(state, pos);
    if (!step) return null;
    const node: ParseNode = {
      rule: name,
      start: pos,
      end: step.end,
      text: state.input.slice(pos, step.end),
      children: step.nodes,
    };
    return { end: step.end, nodes: [node] };
  };
}

export const endOfInput: Matcher = (state, pos) => {
  if (pos >= state.input.length) {
    return { end: pos, nodes: [] };
  }
  recordFailure(state, pos, 'end of input');
  return null;
};

const BLANKS = /[ \t]+/y;

/**
 * Skip one or more spaces or tabs. Never reports a failure.
 */
export const whitespace: Matcher = (state, pos) => {
  BLANKS.lastIndex = pos;
  const match = BLANKS.exec(state.input);
  return match ? { end: pos + match[0].length, nodes: [] } : null;
};

/**
 * Build a combinator for tokens that must be preceded by whitespace.
 *
 * When the separator is missing because the line ended, the token is still
 * attempted at the line boundary so the failure names the missing token
 * rather than the missing whitespace.
 */
export function createSeparator(
  isLineBoundary: (input: string, pos: number) => boolean
): (matcher: Matcher) => Matcher {
  return (matcher) => (state, pos) => {
    const gap = whitespace(state, pos);
    if (gap) return matcher(state, gap.end);
    if (isLineBoundary(state.input, pos)) {
      matcher(state, pos);
      return null;
    }
    recordFailure(state, pos, 'whitespace');
    return null;
  };
}

/**
 * Match `matcher` against the entire input. The matcher must be a named rule.
 */
export function matchEntire(matcher: Matcher, input: string): MatchOutcome {
  const state: MatchState = { input, furthest: 0, expected: new Set(), silent: 0 };
  const step: MatchStep | null = seq(matcher, endOfInput)(state, 0);

  if (!step) {
    return { ok: false, failure: { offset: state.furthest, expected: [...state.expected] } };
  }

  const [node] = step.nodes;
  if (!node) {
    throw new Error('Top-level matcher must be a named rule');
  }
  return { ok: true, node };
}
