import { describe, it, expect } from 'vitest';
import { all, eq, exists, gen, int, le, member, ne, not, or, path, ref, state, where } from '../../../src/lang/builders.js';
import { TRUE_F, toNnf } from '../../../src/verification/normalize.js';
import { Prover } from '../../../src/verification/prover.js';

const prover = new Prover({ instantiationRounds: 4, caseSplitDepth: 4 });
const a = ref('a');
const b = ref('b');
const c = ref('c');
const r = ref('r');
const S = state('S');
const T = state('T');

describe('Prover', () => {
  it('should prove a trivially true goal', () => {
    expect(prover.prove([], TRUE_F)).toBe(true);
  });

  it('should prove symmetry of equality', () => {
    expect(prover.prove([toNnf(eq(a, b))], toNnf(eq(b, a)))).toBe(true);
  });

  it('should not prove an unsupported equality', () => {
    expect(prover.prove([], toNnf(eq(a, b)))).toBe(false);
  });

  it('should instantiate a universal hypothesis with a known member', () => {
    // No element of S shares r's id, and c is in S.
    const fresh = toNnf(not(exists(ref('x'), gen('x', S), where(eq(path(ref('x'), 'val', 'id'), path(r, 'val', 'id'))))));
    const goal = toNnf(ne(path(c, 'val', 'id'), path(r, 'val', 'id')));

    expect(prover.prove([fresh, toNnf(member(c, S))], goal)).toBe(true);
    expect(prover.prove([fresh], goal)).toBe(false);
  });

  it('should prove a universal goal from a universal hypothesis', () => {
    const hyp = toNnf(all(member(ref('y'), T), gen('y', S)));
    const goal = toNnf(all(member(ref('x'), T), gen('x', S)));
    expect(prover.prove([hyp], goal)).toBe(true);
  });

  it('should split cases on a disjunctive hypothesis', () => {
    const hyp = toNnf(or(eq(a, int(1)), eq(a, int(2))));
    expect(prover.prove([hyp], toNnf(le(int(1), a)))).toBe(true);
    expect(prover.prove([hyp], toNnf(le(int(2), a)))).toBe(false);
  });

  it('should refute contradictory formulas', () => {
    expect(prover.refute([toNnf(member(a, S)), toNnf(not(member(a, S)))])).toBe(true);
    expect(prover.refute([toNnf(member(a, S))])).toBe(false);
  });

  it('should give up without case splits when the depth is zero', () => {
    const shallow = new Prover({ instantiationRounds: 4, caseSplitDepth: 0 });
    const hyp = toNnf(or(eq(a, int(1)), eq(a, int(2))));
    expect(shallow.prove([hyp], toNnf(le(int(1), a)))).toBe(false);
  });
});
