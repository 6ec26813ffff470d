import { describe, it, expect } from 'vitest';
import { UnsupportedFragmentError } from '../../../src/core/errors.js';
import {
  all,
  bag,
  count,
  diff,
  eq,
  exists,
  gen,
  member,
  path,
  ref,
  state,
  union,
  unique,
} from '../../../src/lang/builders.js';
import { printExpr } from '../../../src/lang/printer.js';
import { expandPostState } from '../../../src/verification/post-state.js';

const t = ref('t');
const r = ref('r');
const S = state('S');
const T = state('T');

function expanded(...args: Parameters<typeof expandPostState>): string {
  return printExpr(expandPostState(...args));
}

describe('expandPostState', () => {
  describe('membership', () => {
    it('should split membership in a union into a disjunction', () => {
      expect(expanded(member(t, union(S, bag(r))))).toBe('(t in S) or (t == r)');
    });

    it('should strengthen membership in a difference under positive polarity', () => {
      expect(expanded(member(t, diff(S, bag(r))), 'pos')).toBe('(t in S) and (not (t == r))');
    });

    it('should weaken membership in a difference under negative polarity', () => {
      expect(expanded(member(t, diff(S, bag(r))), 'neg')).toBe('t in S');
    });

    it('should refuse membership in a difference under mixed polarity', () => {
      expect(() => expandPostState(member(t, diff(S, bag(r))), 'both')).toThrow(UnsupportedFragmentError);
    });

    it('should reduce membership in an empty bag to false', () => {
      expect(expanded(member(t, bag()))).toBe('false');
    });
  });

  describe('cardinality', () => {
    it('should count a union as a sum', () => {
      expect(expanded(count(union(S, bag(r))))).toBe('len S + 1');
    });

    it('should refuse counting a removal', () => {
      expect(() => expandPostState(count(diff(S, bag(r))))).toThrow(UnsupportedFragmentError);
    });
  });

  describe('quantifiers', () => {
    it('should split a universal over a union', () => {
      const f = all(member(ref('x'), T), gen('x', union(S, bag(r))));
      expect(expanded(f)).toBe('all [x in T | x <- S] and (r in T)');
    });

    it('should split uniqueness over a union into both parts and disjointness', () => {
      const f = unique(path(ref('x'), 'val', 'id'), gen('x', union(S, bag(r))));
      expect(expanded(f)).toBe('(unique [x.val.id | x <- S] and true) and all [x.val.id != r.val.id | x <- S]');
    });

    it('should keep a universal over a removal on the whole bag', () => {
      const f = all(member(ref('x'), T), gen('x', diff(S, bag(r))));
      expect(expanded(f, 'pos')).toBe('all [x in T | x <- S]');
    });

    it('should guard an existential over a removal', () => {
      const f = exists(ref('x'), gen('x', diff(S, bag(r))));
      expect(expanded(f, 'pos')).toBe('exists [x | x <- S, not (x == r)]');
    });

    it('should reduce an existential over an empty bag to false', () => {
      expect(expanded(exists(ref('x'), gen('x', bag())))).toBe('false');
    });
  });

  it('should refuse equality between an updated bag and another bag', () => {
    expect(() => expandPostState(eq(union(S, bag(r)), T))).toThrow(UnsupportedFragmentError);
  });

  it('should leave formulas over plain state bags unchanged', () => {
    const f = all(member(ref('x'), T), gen('x', S));
    expect(expandPostState(f)).toEqual(f);
  });
});
