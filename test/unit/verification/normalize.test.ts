import { describe, it, expect } from 'vitest';
import { all, and, bool, eq, exists, gen, gt, int, lt, le, member, ne, not, or, ref, state, where } from '../../../src/lang/builders.js';
import { FALSE_F, TRUE_F, atom, conj, disj, forall, negate, toNnf } from '../../../src/verification/normalize.js';

const a = ref('a');
const b = ref('b');
const S = state('S');

describe('toNnf', () => {
  it('should turn a negated comparison into the inverse comparison', () => {
    expect(toNnf(not(lt(a, b)))).toEqual(atom(le(b, a)));
    expect(toNnf(not(le(a, b)))).toEqual(atom(lt(b, a)));
  });

  it('should keep disequality as a negative equality atom', () => {
    expect(toNnf(ne(a, b))).toEqual(atom(eq(a, b), false));
    expect(toNnf(not(ne(a, b)))).toEqual(atom(eq(a, b), true));
  });

  it('should swap greater-than into less-than', () => {
    expect(toNnf(gt(a, b))).toEqual(atom(lt(b, a)));
  });

  it('should push negation through connectives', () => {
    const f = toNnf(not(and(eq(a, int(1)), or(eq(b, int(2)), member(a, S)))));
    expect(f).toEqual({
      kind: 'or',
      parts: [atom(eq(a, int(1)), false), { kind: 'and', parts: [atom(eq(b, int(2)), false), atom(member(a, S), false)] }],
    });
  });

  it('should turn `all` into a universal over the same qualifiers', () => {
    const f = toNnf(all(member(ref('x'), state('T')), gen('x', S), where(eq(ref('x'), a))));
    expect(f).toEqual({
      kind: 'forall',
      quals: [gen('x', S), where(eq(ref('x'), a))],
      body: atom(member(ref('x'), state('T'))),
    });
  });

  it('should turn a negated `exists` into a universal with a false body', () => {
    const f = toNnf(not(exists(ref('x'), gen('x', S))));
    expect(f).toEqual({ kind: 'forall', quals: [gen('x', S)], body: FALSE_F });
  });

  it('should reduce boolean literals to constants', () => {
    expect(toNnf(not(and(eq(a, b), bool(false))))).toEqual(TRUE_F);
  });
});

describe('smart constructors', () => {
  it('should flatten and simplify conjunctions', () => {
    const p = atom(eq(a, b));
    expect(conj([TRUE_F, p])).toEqual(p);
    expect(conj([p, FALSE_F])).toEqual(FALSE_F);
    expect(conj([])).toEqual(TRUE_F);
  });

  it('should flatten and simplify disjunctions', () => {
    const p = atom(eq(a, b));
    expect(disj([FALSE_F, p])).toEqual(p);
    expect(disj([p, TRUE_F])).toEqual(TRUE_F);
    expect(disj([])).toEqual(FALSE_F);
  });

  it('should pull a leading guard out of a universal', () => {
    const f = forall([where(eq(a, b)), gen('x', S)], atom(member(ref('x'), state('T'))));
    expect(f).toEqual({
      kind: 'or',
      parts: [atom(eq(a, b), false), { kind: 'forall', quals: [gen('x', S)], body: atom(member(ref('x'), state('T'))) }],
    });
  });

  it('should collapse a universal with a true body', () => {
    expect(forall([gen('x', S)], TRUE_F)).toEqual(TRUE_F);
  });
});

describe('negate', () => {
  it('should dualize quantifiers', () => {
    const f = forall([gen('x', S)], atom(member(ref('x'), state('T'))));
    expect(negate(f)).toEqual({
      kind: 'exists',
      quals: [gen('x', S)],
      body: atom(member(ref('x'), state('T')), false),
    });
  });

  it('should invert an order atom', () => {
    expect(negate(atom(lt(a, b)))).toEqual(atom(le(b, a)));
  });
});
