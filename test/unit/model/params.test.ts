import { describe, it, expect } from 'vitest';
import { ParameterError } from '../../../src/core/errors.js';
import { Bag } from '../../../src/model/bag.js';
import { HandleRegistry } from '../../../src/model/handles.js';
import { bindParams } from '../../../src/model/params.js';
import { intValue, stringValue } from '../../../src/model/values.js';
import { INT, STRING, handleRef } from '../../../src/model/types.js';
import { storyVotesSchema } from '../../../src/schemas/story-votes.js';
import { vote } from '../../helpers/story-votes.js';
import type { ParamDecl, Schema } from '../../../src/model/schema.js';

const schema: Schema = {
  name: 'params',
  types: {},
  state: {},
  invariants: [],
  queries: [],
  operations: [],
};

const decls: ParamDecl[] = [
  { name: 'n', type: INT },
  { name: 'label', type: STRING },
];

describe('bindParams', () => {
  it('should bind positional arguments in declaration order', () => {
    const bound = bindParams('op', decls, [intValue(3), stringValue('x')], schema);
    expect([...bound.keys()]).toEqual(['n', 'label']);
    expect(bound.get('n')).toEqual(intValue(3));
  });

  it('should bind named arguments', () => {
    const bound = bindParams('op', decls, { label: stringValue('x'), n: intValue(3) }, schema);
    expect(bound.get('label')).toEqual(stringValue('x'));
  });

  it('should reject a wrong arity', () => {
    expect(() => bindParams('op', decls, [intValue(3)], schema)).toThrow('op expects 2 argument(s), got 1');
  });

  it('should reject an unknown named argument', () => {
    expect(() => bindParams('op', decls, { n: intValue(1), label: stringValue(''), extra: intValue(0) }, schema)).toThrow(
      'op has no parameter "extra"',
    );
  });

  it('should reject a missing named argument', () => {
    expect(() => bindParams('op', decls, { n: intValue(1) }, schema)).toThrow('op is missing argument "label"');
  });

  it('should turn a type mismatch into a ParameterError', () => {
    let caught: unknown;
    try {
      bindParams('op', decls, [stringValue('3'), stringValue('x')], schema);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ParameterError);
    expect(caught).toMatchObject({ code: 'PARAMETER_ERROR', target: 'op', message: 'op(n): expected Int, got string' });
  });

  describe('handle identity', () => {
    const votes = storyVotesSchema();
    const voteDecls: ParamDecl[] = [{ name: 'v', type: handleRef('Vote') }];
    const handles = HandleRegistry.of([['votes', Bag.of(vote(1))]]);

    it('should accept a handle that matches the stored record', () => {
      const bound = bindParams('reinsert', voteDecls, [vote(1)], votes, handles);
      expect(bound.get('v')).toEqual(vote(1));
    });

    it('should reject a handle that reuses a stored id with other fields', () => {
      expect(() => bindParams('reinsert', voteDecls, [vote(1, 1, 1, 0)], votes, handles)).toThrow(ParameterError);
      expect(() => bindParams('reinsert', voteDecls, [vote(1, 1, 1, 0)], votes, handles)).toThrow(
        'reinsert(v): handle vote_1 is already bound to a different record',
      );
    });

    it('should reject two arguments that disagree on one id', () => {
      const pair: ParamDecl[] = [
        { name: 'a', type: handleRef('Vote') },
        { name: 'b', type: handleRef('Vote') },
      ];
      expect(() => bindParams('swap', pair, [vote(5), vote(5, 2)], votes, HandleRegistry.empty())).toThrow(
        'swap(b): handle vote_5 is already bound to a different record',
      );
    });
  });
});
